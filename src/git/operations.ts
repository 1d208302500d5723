import { simpleGit, type SimpleGit } from "simple-git";

/**
 * Git operations wrapper: abstracts simple-git for testability.
 */
export class GitOperations {
  private git: SimpleGit;

  constructor(repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  /** Tracked files, relative to the repository root, as git reports them. */
  async listTrackedFiles(): Promise<string[]> {
    const out = await this.git.raw(["ls-files", "-z"]);
    return out.split("\0").filter((f) => f.length > 0);
  }

  /** `git describe --tags --always`, used as the engine version when none is configured. */
  async describe(): Promise<string> {
    const result = await this.git.raw(["describe", "--tags", "--always", "--dirty"]);
    return result.trim();
  }
}
