// Git helpers.
// Purpose: list the files a revision range touches, for callers that do not pipe them in.
// Assumes git is on PATH and repoPath is inside a checkout.

import { execa } from "execa";

import { GitError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";

export async function git(repoPath: string, args: string[]): Promise<{ stdout: string }> {
  try {
    const result = await execa("git", args, { cwd: repoPath, stdio: "pipe" });
    return { stdout: result.stdout };
  } catch (err) {
    throw new GitError(`git ${args.join(" ")} failed: ${formatErrorMessage(err)}`, err);
  }
}

export async function listChangedFiles(repoPath: string, range: string): Promise<string[]> {
  try {
    const result = await git(repoPath, ["diff", "--name-only", range]);
    return result.stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Could not list changed files.",
      message: `git diff --name-only ${range} failed in ${repoPath}.`,
      hint: "Check that the revision range exists, or pipe the changed files on stdin instead.",
      cause: err,
    });
  }
}
