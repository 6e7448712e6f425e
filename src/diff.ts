const CONTEXT_LINES = 3;

const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const BOLD = "\x1b[1m";
const RESET = "\x1b[0m";

const NO_NEWLINE = "\\ No newline at end of file";

type Edit =
  | { type: "equal"; text: string; oldLine: number; newLine: number }
  | { type: "del"; text: string; oldLine: number; newLine: number }
  | { type: "add"; text: string; oldLine: number; newLine: number };

/** Splits into lines that keep their terminators, so CRLF and a missing final newline compare as changes. */
function splitLines(content: string): string[] {
  return content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function displayLine(line: string): string {
  const text = line.endsWith("\n") ? line.slice(0, -1) : line;
  return text.endsWith("\r") ? `${text.slice(0, -1)}^M` : text;
}

/** Line edits from a longest-common-subsequence table; deletions precede additions. */
function computeEdits(oldLines: string[], newLines: string[]): Edit[] {
  const m = oldLines.length;
  const n = newLines.length;
  const lcs: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = m - 1; i >= 0; i--) {
    for (let j = n - 1; j >= 0; j--) {
      lcs[i][j] = oldLines[i] === newLines[j] ? lcs[i + 1][j + 1] + 1 : Math.max(lcs[i + 1][j], lcs[i][j + 1]);
    }
  }

  const edits: Edit[] = [];
  let i = 0;
  let j = 0;
  while (i < m || j < n) {
    if (i < m && j < n && oldLines[i] === newLines[j]) {
      edits.push({ type: "equal", text: oldLines[i], oldLine: i, newLine: j });
      i++;
      j++;
    } else if (i < m && (j >= n || lcs[i + 1][j] >= lcs[i][j + 1])) {
      edits.push({ type: "del", text: oldLines[i], oldLine: i, newLine: j });
      i++;
    } else {
      edits.push({ type: "add", text: newLines[j], oldLine: i, newLine: j });
      j++;
    }
  }
  return edits;
}

function formatRange(start: number, count: number): string {
  // Empty ranges point at the line before the hunk.
  const first = count === 0 ? start : start + 1;
  return count === 1 ? `${first}` : `${first},${count}`;
}

/** Unified diff of two texts, or an empty string when they have the same lines. */
export function unifiedDiff(oldContent: string, newContent: string): string {
  const edits = computeEdits(splitLines(oldContent), splitLines(newContent));
  const changed = edits.map((e, idx) => (e.type === "equal" ? -1 : idx)).filter((idx) => idx >= 0);
  if (changed.length === 0) return "";

  const out = ["--- old", "+++ new"];
  let k = 0;
  while (k < changed.length) {
    const start = Math.max(0, changed[k] - CONTEXT_LINES);
    let end = Math.min(edits.length, changed[k] + CONTEXT_LINES + 1);
    k++;
    // Merge changes whose context windows touch.
    while (k < changed.length && changed[k] - CONTEXT_LINES <= end) {
      end = Math.min(edits.length, changed[k] + CONTEXT_LINES + 1);
      k++;
    }

    const hunk = edits.slice(start, end);
    const oldCount = hunk.filter((e) => e.type !== "add").length;
    const newCount = hunk.filter((e) => e.type !== "del").length;
    out.push(`@@ -${formatRange(hunk[0].oldLine, oldCount)} +${formatRange(hunk[0].newLine, newCount)} @@`);
    for (const e of hunk) {
      const prefix = e.type === "add" ? "+" : e.type === "del" ? "-" : " ";
      out.push(`${prefix}${displayLine(e.text)}`);
      if (!e.text.endsWith("\n")) out.push(NO_NEWLINE);
    }
  }
  return out.join("\n");
}

/**
 * Reduces a unified diff to its file headers and changed lines, colored for
 * a terminal when `color` is set. A missing-newline marker stays with the
 * changed line it follows.
 */
export function highlightDiff(oldContent: string, newContent: string, options: { color?: boolean } = {}): string {
  const lines: string[] = [];
  let keptPrevious = false;
  for (const line of unifiedDiff(oldContent, newContent).split("\n")) {
    const keep: boolean = line === NO_NEWLINE ? keptPrevious : line.startsWith("-") || line.startsWith("+");
    if (keep) lines.push(line);
    keptPrevious = keep;
  }

  if (!options.color) return lines.join("\n");

  return lines
    .map((line, idx) => {
      if (idx < 2) return `${BOLD}${line}${RESET}`;
      if (line === NO_NEWLINE) return line;
      return `${line.startsWith("+") ? GREEN : RED}${line}${RESET}`;
    })
    .join("\n");
}
