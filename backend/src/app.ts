import cors from "cors";
import express, { type ErrorRequestHandler, type Response } from "express";
import { z } from "zod";
import { applyProposals } from "./editing/patcher.js";
import { fromWireChange, toAgentEditResponse, toWireChange, toWireRejection } from "./editing/proposals.js";
import { validateProposals } from "./editing/validator.js";
import {
  FileNotFoundError,
  ModelResponseInvalid,
  OverlapError,
  ProjectNotFoundError,
  StaleEditError,
  UpstreamModelError,
  isAbortError
} from "./errors.js";
import { log } from "./logger.js";
import type { ProjectLocks, ProjectStore } from "./projectStore.js";
import type { AgentEditPipeline } from "./services/agentEditPipeline.js";
import { DEFAULT_FILE_NAME, createDocument, singleFileDocument } from "./services/documentService.js";
import { StreamingSession, runStreamingEdit, type StreamSink } from "./services/streamingSession.js";
import type { AgentEditRequest, ImageMimeType, ModelImage } from "./types.js";

export type AppDeps = {
  pipeline: AgentEditPipeline;
  store: ProjectStore;
  locks: ProjectLocks;
  provider: string;
  jsonBodyLimit?: string;
};

const MAX_IMAGES = 5;

const selectionSchema = z
  .object({
    text: z.string(),
    start_line: z.number().int().min(1),
    end_line: z.number().int().min(1)
  })
  .refine((selection) => selection.end_line >= selection.start_line, {
    message: "end_line must not precede start_line"
  });

const agentEditSchema = z.object({
  project_id: z.string().min(1),
  instruction: z.string(),
  document: z.string(),
  file: z.string().min(1).optional(),
  model: z.string().optional(),
  images: z.array(z.string().min(1)).max(MAX_IMAGES).optional(),
  selection: selectionSchema.optional(),
  force_batch: z.boolean().optional()
});

const changeSchema = z.object({
  id: z.string().min(1).optional(),
  file: z.string().min(1).optional(),
  start_line: z.number().int(),
  end_line: z.number().int(),
  original: z.string(),
  replacement: z.string(),
  reason: z.string().default(""),
  accepted: z.union([z.enum(["accepted", "rejected", "undecided"]), z.boolean(), z.null()]).optional()
});

const validateSchema = z.object({
  document: z.string(),
  file: z.string().min(1).optional(),
  changes: z.array(changeSchema).max(500)
});

const applySchema = z.object({
  changes: z.array(changeSchema).max(500)
});

const createProjectSchema = z
  .object({
    files: z.array(z.object({ name: z.string().min(1), content: z.string() })).min(1).max(200),
    main_file: z.string().min(1).optional()
  })
  .superRefine((body, ctx) => {
    const names = new Set<string>();
    for (const file of body.files) {
      if (names.has(file.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate file name "${file.name}".` });
      }
      names.add(file.name);
    }
    if (body.main_file && !names.has(body.main_file)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "main_file must name one of the files." });
    }
  });

type AgentEditBody = z.infer<typeof agentEditSchema>;
type ChangeBody = z.infer<typeof changeSchema>;

const IMAGE_MIME_TYPES: ImageMimeType[] = ["image/png", "image/jpeg", "image/gif", "image/webp"];

function isImageMimeType(value: string): value is ImageMimeType {
  return IMAGE_MIME_TYPES.some((type) => type === value);
}

/** Accepts `data:<mime>;base64,<data>` or bare base64, which is taken as PNG. */
export function parseImage(value: string): ModelImage | null {
  const match = /^data:([^;,]+);base64,(.*)$/s.exec(value.trim());
  if (!match) {
    const data = value.trim();
    return /^[A-Za-z0-9+/=\s]+$/.test(data) ? { mimeType: "image/png", data: data.replace(/\s+/g, "") } : null;
  }
  const mimeType = match[1].toLowerCase();
  if (!isImageMimeType(mimeType)) {
    return null;
  }
  return { mimeType, data: match[2] };
}

function readRouteParam(value: string | string[] | undefined): string {
  if (!value) {
    return "";
  }
  if (Array.isArray(value)) {
    return value[0] || "";
  }
  return value;
}

type BodyCheck = { ok: true; request: AgentEditRequest } | { ok: false; status: number; error: string };

function toAgentEditRequest(payload: AgentEditBody): BodyCheck {
  if (!payload.instruction.trim()) {
    return { ok: false, status: 422, error: "Instruction must not be empty." };
  }
  if (!payload.document.trim()) {
    return { ok: false, status: 422, error: "Document must not be empty." };
  }

  const images: ModelImage[] = [];
  for (const raw of payload.images ?? []) {
    const image = parseImage(raw);
    if (!image) {
      return { ok: false, status: 400, error: "Images must be base64 PNG, JPEG, GIF or WebP data." };
    }
    images.push(image);
  }

  return {
    ok: true,
    request: {
      projectId: payload.project_id,
      instruction: payload.instruction,
      document: payload.document,
      file: payload.file ?? DEFAULT_FILE_NAME,
      model: payload.model,
      images: images.length > 0 ? images : undefined,
      selection: payload.selection
        ? {
            text: payload.selection.text,
            startLine: payload.selection.start_line,
            endLine: payload.selection.end_line
          }
        : undefined,
      forceBatch: payload.force_batch
    }
  };
}

function toProposal(change: ChangeBody, fallbackFile: string) {
  return fromWireChange({ ...change, file: change.file ?? fallbackFile });
}

function sendError(res: Response, error: unknown, fallback: string): Response {
  if (error instanceof z.ZodError) {
    return res.status(400).json({ error: "Invalid request body.", issues: error.issues });
  }
  if (error instanceof ModelResponseInvalid) {
    return res.status(502).json({
      error: "AI response could not be understood, please retry.",
      raw_response: error.rawResponse.slice(0, 2000)
    });
  }
  if (error instanceof UpstreamModelError) {
    return res.status(502).json({ error: error.message, transient: error.transient });
  }
  if (error instanceof StaleEditError) {
    return res.status(409).json({
      error: error.message,
      change: toWireChange(error.proposal),
      actual: error.actualText
    });
  }
  if (error instanceof OverlapError) {
    return res.status(409).json({
      error: error.message,
      changes: error.proposals.map((proposal) => toWireChange(proposal))
    });
  }
  if (error instanceof ProjectNotFoundError || error instanceof FileNotFoundError) {
    return res.status(404).json({ error: error.message });
  }

  log.caught(fallback, error);
  return res.status(500).json({
    error: error instanceof Error ? error.message : fallback
  });
}

function httpStatusOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status >= 400 && error.status < 600 ? error.status : 500;
  }
  return 500;
}

// Body parser failures (malformed JSON, oversized bodies) never reach a route.
const handleUnroutedError: ErrorRequestHandler = (error, _req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  const status = httpStatusOf(error);
  if (status === 413) {
    res.status(413).json({ error: "Request body is too large." });
    return;
  }
  if (status < 500) {
    res.status(status).json({ error: "Request body could not be parsed as JSON." });
    return;
  }
  log.caught("Unhandled request error", error);
  res.status(500).json({ error: "Internal server error." });
};

/** Aborts when the client goes away before the response is written. */
function abortOnDisconnect(res: Response, onAbort: () => void): void {
  res.on("close", () => {
    if (!res.writableFinished) {
      onAbort();
    }
  });
}

export function createApp(deps: AppDeps): express.Express {
  const { pipeline, store, locks } = deps;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: deps.jsonBodyLimit ?? "8mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, now: new Date().toISOString(), provider: deps.provider });
  });

  app.post("/ai/agent-edit", async (req, res) => {
    try {
      const checked = toAgentEditRequest(agentEditSchema.parse(req.body));
      if (!checked.ok) {
        return res.status(checked.status).json({ error: checked.error });
      }

      const controller = new AbortController();
      abortOnDisconnect(res, () => controller.abort());

      const set = await pipeline.propose(checked.request, controller.signal);
      return res.json(toAgentEditResponse(set));
    } catch (error) {
      if (isAbortError(error) && res.destroyed) {
        log.info("Agent edit cancelled by client");
        return res;
      }
      return sendError(res, error, "Failed to generate edits.");
    }
  });

  app.post("/ai/agent-edit/stream", async (req, res) => {
    let checked: BodyCheck;
    try {
      checked = toAgentEditRequest(agentEditSchema.parse(req.body));
    } catch (error) {
      return sendError(res, error, "Failed to start edit stream.");
    }
    if (!checked.ok) {
      return res.status(checked.status).json({ error: checked.error });
    }

    res.status(200);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const sink: StreamSink = {
      send: (event) => {
        res.write(`data: ${JSON.stringify(event)}\n\n`);
      },
      end: () => {
        res.write("data: [DONE]\n\n");
        res.end();
      }
    };
    const session = new StreamingSession(sink);
    abortOnDisconnect(res, () => session.cancel());

    await runStreamingEdit(pipeline, checked.request, session);
    return res;
  });

  app.post("/ai/agent-edit/validate", (req, res) => {
    try {
      const payload = validateSchema.parse(req.body);
      const file = payload.file ?? DEFAULT_FILE_NAME;
      const document = singleFileDocument(file, payload.document);
      const result = validateProposals(
        document,
        payload.changes.map((change) => toProposal(change, file))
      );
      return res.json({
        valid: result.valid.map((proposal) => toWireChange(proposal)),
        rejected: result.rejected.map(toWireRejection)
      });
    } catch (error) {
      return sendError(res, error, "Failed to validate changes.");
    }
  });

  app.post("/projects", async (req, res) => {
    try {
      const payload = createProjectSchema.parse(req.body);
      const id = await store.createProject(createDocument(payload.files, payload.main_file));
      return res.status(201).json({ id });
    } catch (error) {
      return sendError(res, error, "Failed to create project.");
    }
  });

  app.get("/projects/:id/files", async (req, res) => {
    try {
      const document = await store.getFiles(readRouteParam(req.params.id));
      return res.json({ files: document.files, main_file: document.mainFile });
    } catch (error) {
      return sendError(res, error, "Failed to load project.");
    }
  });

  app.post("/projects/:id/apply", async (req, res) => {
    try {
      const projectId = readRouteParam(req.params.id);
      const payload = applySchema.parse(req.body);

      const outcome = await locks.runExclusive(projectId, async () => {
        const current = await store.getFiles(projectId);
        const accepted = payload.changes
          .map((change) => toProposal(change, current.mainFile))
          .filter((proposal) => proposal.accepted === "accepted");
        const next = applyProposals(current, accepted);
        if (next !== current) {
          await store.saveFiles(projectId, next);
        }
        return {
          document: next,
          applied: accepted.length,
          files: [...new Set(accepted.map((proposal) => proposal.file))]
        };
      });

      log.info("Applied edits", { projectId, files: outcome.files, applied: outcome.applied });
      return res.json({
        applied: outcome.applied,
        files: outcome.document.files,
        main_file: outcome.document.mainFile
      });
    } catch (error) {
      return sendError(res, error, "Failed to apply edits.");
    }
  });

  app.use(handleUnroutedError);

  return app;
}
