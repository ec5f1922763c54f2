import { logInfo } from "../utils/logger.js";
import { GitCloneSource } from "./git/gitCloneSource.js";
import { GithubApiSource } from "./github/githubApiSource.js";
import type { RepositorySource, RepositorySourceName } from "./types.js";

export function createRepositorySource(name: RepositorySourceName, githubToken?: string): RepositorySource {
    logInfo(`📦 Repository source: ${name}`);
    switch (name) {
        case "git":
            return new GitCloneSource();
        case "github":
            return new GithubApiSource({ token: githubToken });
    }
}
