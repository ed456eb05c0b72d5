export type ProjectFile = {
  name: string;
  content: string;
};

export type ProjectDocument = {
  files: ProjectFile[];
  mainFile: string;
};

export type AcceptState = "accepted" | "rejected" | "undecided";

export type EditProposal = {
  id: string;
  file: string;
  startLine: number;
  endLine: number;
  originalText: string;
  replacementText: string;
  reason: string;
  accepted: AcceptState;
};

export type RejectionReason =
  | { kind: "stale"; message: string; actualText: string }
  | { kind: "overlaps"; message: string; overlapsWith: string[] }
  | { kind: "out_of_range"; message: string; lineCount: number };

export type RejectedProposal = {
  proposal: EditProposal;
  reason: RejectionReason;
};

export type ValidationResult = {
  valid: EditProposal[];
  rejected: RejectedProposal[];
};

export type ProposalSet = {
  explanation: string;
  proposals: EditProposal[];
  rejected: RejectedProposal[];
  tokensUsed: number;
  windows: number;
};

export type BatchWindow = {
  chunkIndex: number;
  firstLine: number;
  lastLine: number;
};

export type RawEdit = {
  start_line: number;
  end_line: number;
  original: string;
  replacement: string;
  reason: string;
};

export type WindowResult = {
  window: BatchWindow;
  explanation: string;
  proposals: EditProposal[];
  tokensUsed: number;
};

export type SelectionContext = {
  text: string;
  startLine: number;
  endLine: number;
};

export type ImageMimeType = "image/png" | "image/jpeg" | "image/gif" | "image/webp";

export type ModelImage = {
  mimeType: ImageMimeType;
  data: string;
};

export type AgentEditRequest = {
  projectId: string;
  instruction: string;
  document: string;
  file: string;
  model?: string;
  images?: ModelImage[];
  selection?: SelectionContext;
  forceBatch?: boolean;
};

export type WireChange = {
  id: string;
  file: string;
  start_line: number;
  end_line: number;
  original: string;
  replacement: string;
  reason: string;
  accepted: AcceptState;
  diff_html?: string;
};

export type WireRejection = {
  change: WireChange;
  reason: RejectionReason;
};

export type AgentEditResponse = {
  explanation: string;
  changes: WireChange[];
  rejected: WireRejection[];
  tokens: number;
};

export type StreamEvent =
  | { type: "chunk"; text: string }
  | ({ type: "result" } & AgentEditResponse)
  | { type: "error"; message: string };
