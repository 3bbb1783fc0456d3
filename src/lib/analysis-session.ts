import type {
  AnalysisResult,
  ClassificationOptions,
  ComparisonMethod,
  ComparisonRequest,
  ComparisonView,
  ExtractionTuning,
  GroupData,
  Notice,
  RawRow,
  StoredProject,
} from "../types";
import {
  getClassificationOptions,
  getExtractionTuning,
  parseAnalysisParameters,
  parseComparisonMethod,
  type AnalysisConfig,
} from "./analysis-config";
import { aggregate } from "./aggregator";
import { debugLog, debugSave } from "./debug";
import {
  InvalidParametersError,
  PersistenceError,
  SessionStateError,
  ThemeAnalysisError,
  ValidationFailureError,
  errorMessage,
  type GroupValidationProblem,
} from "./errors";
import type { ProjectRepository } from "./project-repository";
import { classifyGroups, DEFAULT_CLASSIFICATION } from "./question-classifier";
import { buildGroup, droppedRowsNotice, loadRecordFile, preprocessRows, validateRows } from "./record-store";
import { DEFAULT_TUNING, extractThemes, withThemeIds } from "./theme-extractor";
import { mapPool } from "./worker-pool";

export type SessionState =
  | { status: "idle" }
  | { status: "processing"; previous: AnalysisResult | null }
  | { status: "ready"; result: AnalysisResult }
  | { status: "loading"; previous: AnalysisResult | null; projectId: number };

// A group comes from a file on disk or from rows already in memory
export type GroupSource = { group: string; path: string } | { group: string; rows: RawRow[] };

export interface ProcessRequest {
  name: string;
  description?: string;
  sources: GroupSource[];
  parameters: { minThemeFreq: unknown; numThemes: unknown; extractionMethod: unknown };
  comparison?: { method: unknown; theme?: string; groups?: string[] };
  save?: boolean;
}

export type PersistenceOutcome =
  | { status: "saved"; projectId: number }
  | { status: "failed"; error: PersistenceError }
  | { status: "skipped" };

export interface RunOutcome {
  result: AnalysisResult;
  notices: Notice[];
  comparison: ComparisonView | null;
  // Why the requested comparison could not be produced; the run itself stands
  comparisonError: ThemeAnalysisError | null;
  persistence: PersistenceOutcome;
}

export interface SessionSettings {
  tuning: ExtractionTuning;
  classification: ClassificationOptions;
  concurrency: number;
  comparisonMethod: ComparisonMethod;
}

export const DEFAULT_SESSION_SETTINGS: SessionSettings = {
  tuning: DEFAULT_TUNING,
  classification: DEFAULT_CLASSIFICATION,
  concurrency: 3,
  comparisonMethod: "Theme Prevalence",
};

export function sessionSettingsFromConfig(config: AnalysisConfig): SessionSettings {
  return {
    tuning: getExtractionTuning(config),
    classification: getClassificationOptions(config),
    concurrency: config.concurrency,
    comparisonMethod: config.analysis.comparisonMethod,
  };
}

/**
 * The current analysis and the transitions between analyses:
 * idle → processing → ready, ready → loading → ready. A result is only ever
 * replaced as a whole, and a failed run or load leaves the previous one in
 * place.
 */
export class AnalysisSession {
  private state: SessionState = { status: "idle" };

  constructor(
    private readonly repository: ProjectRepository | null,
    private readonly settings: SessionSettings = DEFAULT_SESSION_SETTINGS
  ) {}

  // Start from the project the repository marks as current, if any
  static restore(repository: ProjectRepository, settings: SessionSettings = DEFAULT_SESSION_SETTINGS): AnalysisSession {
    const session = new AnalysisSession(repository, settings);
    const currentId = repository.getCurrentProjectId();
    if (currentId !== null) {
      try {
        session.load(currentId);
      } catch (error) {
        console.warn(`⚠️  Could not restore project ${currentId}: ${errorMessage(error)}`);
      }
    }
    return session;
  }

  getState(): SessionState {
    return this.state;
  }

  get current(): AnalysisResult | null {
    return this.state.status === "ready" ? this.state.result : null;
  }

  get currentProjectId(): number | null {
    return this.current?.project?.id ?? null;
  }

  async process(request: ProcessRequest): Promise<RunOutcome> {
    const previous = this.settledResult("process");

    // Rejected before any processing starts
    const parameters = parseAnalysisParameters(request.parameters);
    const comparisonMethod = parseComparisonMethod(request.comparison?.method ?? this.settings.comparisonMethod);
    assertDistinctGroups(request.sources);

    this.state = { status: "processing", previous };

    let result: AnalysisResult;
    const notices: Notice[] = [];
    try {
      console.log(`📥 Loading ${request.sources.length} group(s)`);
      const loaded = await mapPool(request.sources, this.settings.concurrency, async source => ({
        source,
        rows: "rows" in source ? source.rows : await loadRecordFile(source.path),
      }));

      // Every group must validate before anything is extracted
      const failures: GroupValidationProblem[] = [];
      for (const { source, rows } of loaded) {
        const report = validateRows(rows);
        if (!report.valid) failures.push({ group: source.group, problems: report.problems });
      }
      if (failures.length > 0) {
        throw new ValidationFailureError(failures);
      }

      const groups: GroupData[] = loaded.map(({ source, rows }) => {
        const group = buildGroup(source.group, preprocessRows(rows, source.group), "path" in source ? source.path : null);
        const dropped = droppedRowsNotice(group.group, rows.length, group.records.length);
        if (dropped) notices.push(dropped);
        return group;
      });
      for (const group of groups) {
        console.log(`   ${group.group}: ${group.records.length} record(s)`);
      }

      const corpus = groups.flatMap(g => g.records);
      console.log(`🔍 Extracting themes with ${parameters.extractionMethod} from ${corpus.length} record(s)`);
      const extraction = extractThemes(corpus, parameters, this.settings.tuning);
      if (extraction.notice) notices.push(extraction.notice);
      console.log(`   Found ${extraction.taxonomy.size} theme(s)`);
      await debugSave("taxonomy.json", extraction.taxonomy);

      console.log(`🎯 Classifying ${groups.length} group(s)`);
      const classified = await classifyGroups(
        groups,
        extraction.taxonomy,
        this.settings.classification,
        this.settings.concurrency
      );
      const counts = classified.map(c => c.counts);
      const firstNotice = classified.find(c => c.notice)?.notice;
      if (firstNotice) notices.push(firstNotice);
      await debugSave("counts.json", counts);

      result = freezeResult({
        project: null,
        parameters,
        classification: this.settings.classification,
        groups,
        taxonomy: extraction.taxonomy,
        counts,
      });
    } catch (error) {
      this.state = previous ? { status: "ready", result: previous } : { status: "idle" };
      throw error;
    }

    // Processing succeeded; saving is reported separately
    let persistence: PersistenceOutcome = { status: "skipped" };
    if (request.save !== false && this.repository) {
      try {
        const saved = this.persist(result, request.name, request.description ?? "");
        result = saved.result;
        persistence = { status: "saved", projectId: saved.projectId };
        console.log(`💾 Saved project ${saved.projectId}`);
      } catch (error) {
        if (!(error instanceof PersistenceError)) {
          this.state = previous ? { status: "ready", result: previous } : { status: "idle" };
          throw error;
        }
        persistence = { status: "failed", error };
        console.error(`❌ ${error.message}`);
      }
    }

    this.state = { status: "ready", result };

    // A theme or group the run did not produce fails the comparison only
    let comparison: ComparisonView | null = null;
    let comparisonError: ThemeAnalysisError | null = null;
    try {
      comparison = this.compareResult(result, {
        method: comparisonMethod,
        theme: request.comparison?.theme,
        groups: request.comparison?.groups,
      });
    } catch (error) {
      if (!(error instanceof ThemeAnalysisError)) throw error;
      comparisonError = error;
      debugLog(`Comparison failed: ${error.message}`);
    }

    return { result, notices, comparison, comparisonError, persistence };
  }

  load(projectId: number): AnalysisResult {
    const previous = this.settledResult("load");
    const repository = this.requireRepository();

    this.state = { status: "loading", previous, projectId };
    try {
      const result = fromStoredProject(repository.loadProject(projectId));
      repository.setCurrentProjectId(projectId);
      this.state = { status: "ready", result };
      debugLog(`Loaded project ${projectId} with ${result.taxonomy.size} theme(s)`);
      return result;
    } catch (error) {
      this.state = previous ? { status: "ready", result: previous } : { status: "idle" };
      throw error;
    }
  }

  deleteProject(projectId: number): boolean {
    this.settledResult("delete a project");
    if (this.currentProjectId === projectId) {
      throw new SessionStateError(`Project ${projectId} is the current project and cannot be deleted`);
    }
    return this.requireRepository().deleteProject(projectId);
  }

  compare(request: ComparisonRequest): ComparisonView | null {
    const result = this.current;
    if (!result) {
      throw new SessionStateError("No analysis is loaded");
    }
    return this.compareResult(result, request);
  }

  private compareResult(result: AnalysisResult, request: ComparisonRequest): ComparisonView | null {
    // Question Distribution defaults to the first theme; with no themes there is nothing to show
    let theme = request.theme;
    if (request.method === "Question Distribution" && !theme) {
      theme = result.taxonomy.keys().next().value;
      if (!theme) return null;
    }
    return aggregate(
      result.groups,
      result.taxonomy,
      result.counts,
      { ...request, theme },
      result.classification
    );
  }

  private persist(
    result: AnalysisResult,
    name: string,
    description: string
  ): { result: AnalysisResult; projectId: number } {
    const repository = this.requireRepository();
    const { projectId, themeIds } = repository.saveAnalysis(
      {
        name,
        description,
        parameters: result.parameters,
        groups: result.groups,
        taxonomy: result.taxonomy,
        counts: result.counts,
      },
      result.classification
    );
    repository.setCurrentProjectId(projectId);

    return {
      projectId,
      result: freezeResult({
        ...result,
        project: repository.getProject(projectId),
        taxonomy: withThemeIds(result.taxonomy, themeIds),
      }),
    };
  }

  private settledResult(action: string): AnalysisResult | null {
    switch (this.state.status) {
      case "idle":
        return null;
      case "ready":
        return this.state.result;
      default:
        throw new SessionStateError(`Cannot ${action} while ${this.state.status}`);
    }
  }

  private requireRepository(): ProjectRepository {
    if (!this.repository) {
      throw new SessionStateError("No project repository is configured");
    }
    return this.repository;
  }
}

function assertDistinctGroups(sources: readonly GroupSource[]) {
  if (sources.length === 0) {
    throw new InvalidParametersError("At least one group is required");
  }
  const seen = new Set<string>();
  for (const { group } of sources) {
    if (!group.trim()) {
      throw new InvalidParametersError("Group names must not be empty");
    }
    if (seen.has(group)) {
      throw new InvalidParametersError(`Group "${group}" is listed twice`);
    }
    seen.add(group);
  }
}

export function fromStoredProject(stored: StoredProject): AnalysisResult {
  return freezeResult({
    project: stored.project,
    parameters: stored.project.parameters,
    classification: stored.project.classification,
    groups: stored.groups,
    taxonomy: stored.taxonomy,
    counts: stored.counts,
  });
}

function freezeResult(result: AnalysisResult): AnalysisResult {
  return Object.freeze({
    ...result,
    parameters: Object.freeze({ ...result.parameters }),
    classification: Object.freeze({ ...result.classification }),
    groups: Object.freeze([...result.groups]),
    counts: Object.freeze(result.counts.map(c => Object.freeze([...c]))),
  });
}
