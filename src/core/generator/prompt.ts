export const COMMIT_INSTRUCTIONS = `Write a commit message based on the git diff and git branch provided.
The message starts with the type of change (feat, fix, chore, refactor, docs, test), followed by a short summary of the change.
End the message with the git branch name.
Use exactly this format, on a single line:
{type}: {commit message} - {branch name}`;

export function buildPromptInput(diff: string, branch: string): string {
	return `Git Diff:\n${diff}\n\nBranch: ${branch}`;
}
