import type { CommandMeta } from '../help.js';

export const copyMeta: CommandMeta = {
  description:
    'Copy untracked config files (.env*, CLAUDE.md, .claude/, .vscode/settings.json, ...) from the source tree into target directories',
  whenToUse:
    'Right after creating a worktree or fresh checkout that is missing secrets, AI assistant config or editor settings',
  examples: [
    'copy-configs --target ../feature-branch',
    'copy-configs -t ../wt-a -t ../wt-b --conflict backup',
    'echo ../feature-branch | copy-configs --dry-run',
    'copy-configs --config team.copyconfigs --source ~/src/app --target ../app-review',
  ],
  expectedOutput:
    'One line per copied, kept or failed item, then a per-target summary. Exit 0 when the run completes (even with per-item failures), 1 on a configuration error or when no targets are given, 130 when interrupted.',
};
