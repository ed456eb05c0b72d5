import { diffWords } from "diff";
import { FileNotFoundError } from "../errors.js";
import type { ProjectDocument, ProjectFile } from "../types.js";

export const DEFAULT_FILE_NAME = "main.tex";

/**
 * Builds a project document. File order is kept as given; names must be unique and
 * the main file must be one of them.
 */
export function createDocument(files: ProjectFile[], mainFile?: string): ProjectDocument {
  const seen = new Set<string>();
  for (const file of files) {
    if (seen.has(file.name)) {
      throw new Error(`Duplicate file name "${file.name}".`);
    }
    seen.add(file.name);
  }

  const resolvedMain = mainFile ?? files[0]?.name ?? DEFAULT_FILE_NAME;
  if (files.length > 0 && !seen.has(resolvedMain)) {
    throw new Error(`Main file "${resolvedMain}" is not part of the project.`);
  }

  return {
    files: files.map((file) => ({ name: file.name, content: file.content })),
    mainFile: resolvedMain
  };
}

export function singleFileDocument(name: string, content: string): ProjectDocument {
  return createDocument([{ name, content }], name);
}

export function getFile(document: ProjectDocument, name: string): ProjectFile | undefined {
  return document.files.find((file) => file.name === name);
}

export function requireFile(document: ProjectDocument, name: string): ProjectFile {
  const file = getFile(document, name);
  if (!file) {
    throw new FileNotFoundError(name);
  }
  return file;
}

export function withFileContent(document: ProjectDocument, name: string, content: string): ProjectDocument {
  let found = false;
  const files = document.files.map((file) => {
    if (file.name !== name) {
      return file;
    }
    found = true;
    return { name: file.name, content };
  });

  return {
    files: found ? files : [...files, { name, content }],
    mainFile: document.mainFile
  };
}

export function removeFile(document: ProjectDocument, name: string): ProjectDocument {
  return {
    files: document.files.filter((file) => file.name !== name),
    mainFile: document.mainFile
  };
}

export function cloneDocument(document: ProjectDocument): ProjectDocument {
  return {
    files: document.files.map((file) => ({ ...file })),
    mainFile: document.mainFile
  };
}

// "" has no lines; "a\n" has one line. Carriage returns before a line break are dropped.
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const body = text.endsWith("\n") ? text.slice(0, -1) : text;
  return body.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

export function lineCount(text: string): number {
  return splitLines(text).length;
}

export type TerminatedLine = { text: string; eol: "\n" | "\r\n" | "" };

/** Like splitLines, but each line keeps its own terminator; only the last may have none. */
export function splitTerminatedLines(text: string): TerminatedLine[] {
  if (text.length === 0) {
    return [];
  }
  const parts = text.split("\n");
  const last = parts.pop() ?? "";
  const lines = parts.map((part): TerminatedLine =>
    part.endsWith("\r") ? { text: part.slice(0, -1), eol: "\r\n" } : { text: part, eol: "\n" }
  );
  if (last.length > 0) {
    lines.push({ text: last, eol: "" });
  }
  return lines;
}

export function joinTerminatedLines(lines: TerminatedLine[]): string {
  return lines.map((line) => line.text + line.eol).join("");
}

/** The terminator most lines use; LF on a tie or when no line is terminated. */
export function dominantEol(lines: TerminatedLine[]): "\n" | "\r\n" {
  let crlf = 0;
  let lf = 0;
  for (const line of lines) {
    if (line.eol === "\r\n") crlf += 1;
    else if (line.eol === "\n") lf += 1;
  }
  return crlf > lf ? "\r\n" : "\n";
}

/** 1-indexed, inclusive on both ends. */
export function sliceLines(text: string, startLine: number, endLine: number): string {
  return splitLines(text).slice(startLine - 1, endLine).join("\n");
}

export function numberLines(text: string, offset = 0): string {
  const lines = splitLines(text);
  const width = String(offset + lines.length).length;
  return lines
    .map((line, index) => `${String(offset + index + 1).padStart(width, " ")}| ${line}`)
    .join("\n");
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

export function buildDiffHtml(originalText: string, proposedText: string): string {
  const parts = diffWords(originalText, proposedText);
  return parts
    .map((part) => {
      const safeValue = escapeHtml(part.value);
      if (part.added) {
        return `<span class="diff-added">${safeValue}</span>`;
      }
      if (part.removed) {
        return `<span class="diff-removed">${safeValue}</span>`;
      }
      return `<span>${safeValue}</span>`;
    })
    .join("");
}
