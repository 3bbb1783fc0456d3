import { loadAnalysisConfig, getDatabasePath, type AnalysisConfig } from "../lib/analysis-config";
import { AnalysisSession, sessionSettingsFromConfig } from "../lib/analysis-session";
import { openDb, type Db } from "../lib/database";
import { initDebug, isDebugEnabled } from "../lib/debug";
import { InvalidParametersError, ThemeAnalysisError, errorMessage } from "../lib/errors";
import { ProjectRepository } from "../lib/project-repository";
import type { AnalysisResult } from "../types";

export interface CommonOptions {
  config?: string;
  debug?: boolean;
}

export interface CommandContext {
  config: AnalysisConfig;
  db: Db;
  repository: ProjectRepository;
  session: AnalysisSession;
}

export async function openContext(options: CommonOptions): Promise<CommandContext> {
  await initDebug(options.debug);

  const config = loadAnalysisConfig(options.config);
  const db = openDb(getDatabasePath(config));
  const repository = new ProjectRepository(db);
  const session = AnalysisSession.restore(repository, sessionSettingsFromConfig(config));
  return { config, db, repository, session };
}

export function parseProjectId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id < 1) {
    throw new InvalidParametersError(`Invalid project id "${value}"`);
  }
  return id;
}

// Load the given project (making it current), or fall back to the current one
export function resolveProject(session: AnalysisSession, projectId: string | undefined): AnalysisResult {
  if (projectId !== undefined) {
    return session.load(parseProjectId(projectId));
  }
  const current = session.current;
  if (!current) {
    throw new InvalidParametersError("No current project; pass a project id or run `projects use <id>`");
  }
  return current;
}

export function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(",").map(item => item.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

export function reportFailure(error: unknown): never {
  console.error(`❌ ${errorMessage(error)}`);
  if (error instanceof ThemeAnalysisError && error.cause !== undefined) {
    console.error(`   Caused by: ${errorMessage(error.cause)}`);
  }
  if (isDebugEnabled() && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}
