import { splitLines } from "../services/documentService.js";
import type { BatchWindow, EditProposal, WindowResult } from "../types.js";
import { proposalKey } from "./proposals.js";

export type PlanOptions = {
  forceBatch?: boolean;
  tokenThreshold: number;
  overlapLines: number;
};

// Rough chars-per-token ratio for Latin-script LaTeX source.
const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

function lineCost(line: string): number {
  // +1 for the newline the line carries in the prompt.
  return estimateTokens(line) + 1;
}

const ENVIRONMENT_MARKER = /\\(begin|end)\{([^}]*)\}/g;

function stripComment(line: string): string {
  return line.replace(/(^|[^\\])%.*$/, "$1");
}

/**
 * Environment nesting depth after each line. The `document` environment is not
 * counted, since it usually wraps the whole file.
 */
export function environmentDepths(lines: string[]): number[] {
  let depth = 0;
  return lines.map((line) => {
    for (const match of stripComment(line).matchAll(ENVIRONMENT_MARKER)) {
      if (match[2] === "document") {
        continue;
      }
      depth = match[1] === "begin" ? depth + 1 : Math.max(0, depth - 1);
    }
    return depth;
  });
}

/**
 * Splits a document into line windows that each stay under the token threshold.
 *
 * Windows after the first start `overlapLines` before the previous window's last
 * line, so boundary edits see surrounding context. A window does not end inside a
 * `\begin{...}`/`\end{...}` environment unless the environment cannot fit in one.
 * A single line over the threshold is kept whole in a window of its own. Returns []
 * for an empty document.
 */
export function planWindows(text: string, opts: PlanOptions): BatchWindow[] {
  const lines = splitLines(text);
  if (lines.length === 0) {
    return [];
  }

  const threshold = Math.max(1, opts.tokenThreshold);
  if (!opts.forceBatch && estimateTokens(text) < threshold) {
    return [{ chunkIndex: 0, firstLine: 1, lastLine: lines.length }];
  }

  const costs = lines.map(lineCost);
  const depths = environmentDepths(lines);
  const overlap = Math.max(0, opts.overlapLines);
  const windows: BatchWindow[] = [];

  // 0-indexed cursor of the first line that no window has covered yet.
  let nextFresh = 0;
  while (nextFresh < lines.length) {
    let start = windows.length === 0 ? 0 : Math.max(0, nextFresh - overlap);
    let budget = 0;
    for (let index = start; index < nextFresh; index += 1) {
      budget += costs[index];
    }

    // Context lines never crowd out fresh content; drop them until one fresh line fits.
    while (start < nextFresh && budget + costs[nextFresh] > threshold) {
      budget -= costs[start];
      start += 1;
    }

    let end = nextFresh;
    budget += costs[end];
    while (end + 1 < lines.length && budget + costs[end + 1] <= threshold) {
      end += 1;
      budget += costs[end];
    }

    if (end + 1 < lines.length && depths[end] > 0) {
      let closed = end - 1;
      while (closed >= nextFresh && depths[closed] > 0) {
        closed -= 1;
      }
      if (closed >= nextFresh) {
        end = closed;
      }
    }

    windows.push({
      chunkIndex: windows.length,
      firstLine: start + 1,
      lastLine: end + 1
    });
    nextFresh = end + 1;
  }

  return windows;
}

export function windowText(text: string, window: BatchWindow): string {
  return splitLines(text)
    .slice(window.firstLine - 1, window.lastLine)
    .join("\n");
}

export type MergedResult = {
  explanation: string;
  proposals: EditProposal[];
  tokensUsed: number;
};

/**
 * Concatenates window results in window order. A proposal whose range and replacement
 * were already proposed by an earlier window (the overlap lines) is dropped.
 */
export function mergeWindowResults(results: WindowResult[]): MergedResult {
  const ordered = [...results].sort((left, right) => left.window.chunkIndex - right.window.chunkIndex);
  const seen = new Set<string>();
  const proposals: EditProposal[] = [];
  const explanations: string[] = [];
  let tokensUsed = 0;

  for (const result of ordered) {
    tokensUsed += result.tokensUsed;
    const explanation = result.explanation.trim();
    if (explanation) {
      explanations.push(explanation);
    }
    for (const proposal of result.proposals) {
      const key = proposalKey(proposal);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      proposals.push(proposal);
    }
  }

  return {
    explanation: explanations.join("\n\n"),
    proposals,
    tokensUsed
  };
}
