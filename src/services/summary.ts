import type { CommitRecord, FileChange, FileStatus } from "../types/index.js";

export const NO_ACTIVITY_SUMMARY = "No commits found in the last 24 hours.";
export const MAX_PATCH_LINES = 500;
export const MAX_PATCH_CHARS = 2000;

const RULE = "=".repeat(80);

const STATUS_MARKERS: Partial<Record<FileStatus, string>> = {
  added: "➕",
  removed: "➖",
  modified: "✏️",
  renamed: "📝",
};

export interface TruncatedPatch {
  text: string;
  /** Lines dropped by the line cap */
  omittedLines: number;
  /** Whether the character cap cut the text */
  cut: boolean;
}

/**
 * Applies the line cap, then the character cap.
 */
export function truncatePatch(
  patch: string,
  maxLines: number = MAX_PATCH_LINES,
  maxChars: number = MAX_PATCH_CHARS
): TruncatedPatch {
  const lines = patch.split("\n");
  const omittedLines = Math.max(lines.length - maxLines, 0);
  const byLines = omittedLines > 0 ? lines.slice(0, maxLines).join("\n") : patch;
  const cut = byLines.length > maxChars;
  return { text: cut ? byLines.slice(0, maxChars) : byLines, omittedLines, cut };
}

function formatFile(file: FileChange): string[] {
  const marker = STATUS_MARKERS[file.status] ?? "📄";
  const lines = [
    "",
    `  ${marker} ${file.filename} (${file.status.toUpperCase()})`,
    `     +${file.additions} -${file.deletions} lines`,
  ];

  if (file.patch) {
    const { text, omittedLines, cut } = truncatePatch(file.patch);
    lines.push("", "     Code Changes:", text);
    if (omittedLines > 0) {
      lines.push(`     ... (truncated, ${omittedLines} more lines)`);
    }
    if (cut) {
      lines.push("     ... (truncated)");
    }
  }

  return lines;
}

function formatCommit(commit: CommitRecord, index: number): string[] {
  const lines = [
    RULE,
    `Commit #${index}: ${commit.repository}`,
    RULE,
    `🔗 URL: ${commit.url}`,
    `🔖 SHA: ${commit.sha}`,
    `👤 Author: ${commit.author}`,
    `📅 Date: ${commit.date}`,
    `💬 Message: ${commit.message}`,
    "",
    "📈 Statistics:",
    `  • Files Changed: ${commit.files.length}`,
    `  • Total Additions: +${commit.stats.additions}`,
    `  • Total Deletions: -${commit.stats.deletions}`,
    `  • Total Changes: ${commit.stats.total} lines`,
    "",
    "📁 Files Changed:",
  ];

  for (const file of commit.files) {
    lines.push(...formatFile(file));
  }

  lines.push("", "");
  return lines;
}

/**
 * Renders commit records as the text block handed to the language model.
 */
export function formatCommitsForAnalysis(commits: readonly CommitRecord[]): string {
  if (commits.length === 0) {
    return NO_ACTIVITY_SUMMARY;
  }

  const additions = commits.reduce((sum, commit) => sum + commit.stats.additions, 0);
  const deletions = commits.reduce((sum, commit) => sum + commit.stats.deletions, 0);
  const repositories = new Set(commits.map((commit) => commit.repository));

  const lines = [
    "📊 GitHub Activity Summary - Last 24 Hours",
    `Total Commits: ${commits.length}`,
    `Repositories: ${repositories.size}`,
    `Lines Added: +${additions}`,
    `Lines Deleted: -${deletions}`,
    "",
  ];

  commits.forEach((commit, i) => {
    lines.push(...formatCommit(commit, i + 1));
  });

  return lines.join("\n");
}
