import { promises as fs } from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { ProjectNotFoundError } from "../errors.js";
import type { ProjectStore } from "../projectStore.js";
import type { ProjectDocument } from "../types.js";
import { cloneDocument, createDocument } from "./documentService.js";

const persistedProjectSchema = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  mainFile: z.string().min(1),
  files: z.array(z.object({ name: z.string().min(1), content: z.string() }))
});

type PersistedProjectFile = z.infer<typeof persistedProjectSchema>;

const PROJECT_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/** One JSON file per project under `<dataDir>/projects/`. */
export class FileProjectStore implements ProjectStore {
  private readonly projectsDir: string;

  constructor(dataDir: string) {
    this.projectsDir = path.resolve(dataDir, "projects");
  }

  private projectPath(projectId: string): string {
    if (!PROJECT_ID_PATTERN.test(projectId)) {
      throw new ProjectNotFoundError(projectId);
    }
    return path.join(this.projectsDir, `${projectId}.json`);
  }

  private async write(projectId: string, document: ProjectDocument): Promise<void> {
    const payload: PersistedProjectFile = {
      version: 1,
      savedAt: new Date().toISOString(),
      mainFile: document.mainFile,
      files: cloneDocument(document).files
    };
    await fs.mkdir(this.projectsDir, { recursive: true });
    const target = this.projectPath(projectId);
    const temp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(temp, JSON.stringify(payload, null, 2), "utf8");
    await fs.rename(temp, target);
  }

  async createProject(document: ProjectDocument): Promise<string> {
    const id = uuidv4();
    await this.write(id, document);
    return id;
  }

  async getFiles(projectId: string): Promise<ProjectDocument> {
    let raw = "";
    try {
      raw = await fs.readFile(this.projectPath(projectId), "utf8");
    } catch (error) {
      const code = typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
      if (code === "ENOENT") {
        throw new ProjectNotFoundError(projectId);
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new Error(`Saved project "${projectId}" is invalid JSON.`);
    }
    const parsed = persistedProjectSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Saved project "${projectId}" has an unsupported format.`);
    }
    return createDocument(parsed.data.files, parsed.data.mainFile);
  }

  async saveFiles(projectId: string, document: ProjectDocument): Promise<void> {
    await this.getFiles(projectId);
    await this.write(projectId, document);
  }
}
