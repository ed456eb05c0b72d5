import { v4 as uuidv4 } from "uuid";
import { ProjectNotFoundError } from "./errors.js";
import { cloneDocument } from "./services/documentService.js";
import type { ProjectDocument } from "./types.js";

export interface ProjectStore {
  getFiles(projectId: string): Promise<ProjectDocument>;
  saveFiles(projectId: string, document: ProjectDocument): Promise<void>;
  createProject(document: ProjectDocument): Promise<string>;
}

export class InMemoryProjectStore implements ProjectStore {
  private readonly projects = new Map<string, ProjectDocument>();

  async createProject(document: ProjectDocument): Promise<string> {
    const id = uuidv4();
    this.projects.set(id, cloneDocument(document));
    return id;
  }

  async getFiles(projectId: string): Promise<ProjectDocument> {
    const project = this.projects.get(projectId);
    if (!project) {
      throw new ProjectNotFoundError(projectId);
    }
    return cloneDocument(project);
  }

  async saveFiles(projectId: string, document: ProjectDocument): Promise<void> {
    if (!this.projects.has(projectId)) {
      throw new ProjectNotFoundError(projectId);
    }
    this.projects.set(projectId, cloneDocument(document));
  }
}

/**
 * Serializes work per project. Callers queue behind whatever is already running for
 * the same id; different projects never wait on each other.
 */
export class ProjectLocks {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(projectId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(projectId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(projectId, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(projectId) === tail) {
        this.tails.delete(projectId);
      }
    }
  }

  isLocked(projectId: string): boolean {
    return this.tails.has(projectId);
  }
}
