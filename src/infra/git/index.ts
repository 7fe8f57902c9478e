export {createGitRunner, runGit, GitCommandError, type GitRunner} from './runGit';
export {
	createRepositoryInspector,
	type RepositoryInspector,
} from './inspector';
export {createCommitExecutor, type CommitExecutor} from './committer';
