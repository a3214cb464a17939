import { mkdir, readFile, rename, writeFile } from "fs/promises";
import * as path from "path";

import {
  createInitialProjectState,
  isValidProjectId,
  projectStateSchema,
  type ProjectPersistence,
  type ProjectState,
} from "../project-state";

const STATE_FILE = "project_state.json";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function projectDir(projectsDir: string, projectId: string): string {
  if (!isValidProjectId(projectId)) {
    throw new Error(`Invalid project id: ${projectId}`);
  }
  return path.join(projectsDir, projectId);
}

/**
 * Stores each project document at <projectsDir>/<projectId>/project_state.json.
 * Writes go to a temp file first and are renamed into place.
 */
export class FileProjectPersistence implements ProjectPersistence {
  constructor(private readonly projectsDir: string) {}

  statePath(projectId: string): string {
    return path.join(projectDir(this.projectsDir, projectId), STATE_FILE);
  }

  async load(projectId: string): Promise<ProjectState> {
    const statePath = this.statePath(projectId);

    let content: string;
    try {
      content = await readFile(statePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return createInitialProjectState(projectId);
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new Error(`Project state at ${statePath} is not valid JSON`, { cause: error });
    }

    const result = projectStateSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Project state at ${statePath} failed validation: ${result.error.message}`);
    }
    return result.data;
  }

  async save(projectId: string, state: ProjectState): Promise<void> {
    const statePath = this.statePath(projectId);
    await mkdir(path.dirname(statePath), { recursive: true });

    const stateWithTimestamp: ProjectState = {
      ...state,
      lastSavedAt: new Date().toISOString(),
    };
    const tempPath = `${statePath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(stateWithTimestamp, null, 2), "utf-8");
    await rename(tempPath, statePath);
  }
}
