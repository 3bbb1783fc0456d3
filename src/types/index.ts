// Parameter enumerations accepted by the pipeline
export const EXTRACTION_METHODS = ["TF-IDF Clustering", "Keyword Extraction", "Topic Modeling"] as const;
export const COMPARISON_METHODS = ["Theme Prevalence", "Question Distribution", "Response Length"] as const;
export const EXPORT_FORMATS = ["Excel", "CSV", "PDF"] as const;

export type ExtractionMethod = (typeof EXTRACTION_METHODS)[number];
export type ComparisonMethod = (typeof COMPARISON_METHODS)[number];
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export type GroupId = string;

// Raw row as it comes out of a CSV or spreadsheet
export type RawRow = Record<string, unknown>;

export interface InterviewRecord {
  readonly question: string;
  readonly response: string;
  readonly respondentId: string;
  readonly group: GroupId;
}

export interface GroupData {
  readonly group: GroupId;
  readonly sourceFile: string | null;
  readonly records: readonly InterviewRecord[];
}

export type Corpus = readonly InterviewRecord[];

export interface Theme {
  readonly id: number | null;
  readonly name: string;
  readonly keywords: readonly string[];
  readonly frequency: number;
}

// Theme name -> theme, in discovery order
export type Taxonomy = ReadonlyMap<string, Theme>;

export interface QuestionCount {
  readonly themeName: string;
  readonly questionText: string;
  readonly group: GroupId;
  readonly count: number;
}

export interface ThemeQuestionCounts {
  readonly themeName: string;
  readonly group: GroupId;
  readonly total: number;
  readonly questions: readonly QuestionCount[];
}

export interface AnalysisParameters {
  minThemeFreq: number;
  numThemes: number;
  extractionMethod: ExtractionMethod;
}

// Knobs of the three extraction strategies
export interface ExtractionTuning {
  keywordsPerTheme: number;
  maxIterations: number;
  topicIterations: number;
  alpha: number;
  beta: number;
  seed: number;
}

export interface ClassificationOptions {
  similarityFloor: number;
  maxThemesPerRecord: number;
}

// Non-fatal outcomes, returned next to a result
export type NoticeCode = "EMPTY_CORPUS" | "NO_THEMES" | "EMPTY_TAXONOMY" | "ROWS_DROPPED";

export interface Notice {
  code: NoticeCode;
  message: string;
}

export interface ExtractionOutcome {
  taxonomy: Taxonomy;
  notice: Notice | null;
}

export interface ClassificationOutcome {
  counts: ThemeQuestionCounts[];
  notice: Notice | null;
}

// Comparison views
export interface ComparisonRequest {
  method: ComparisonMethod;
  theme?: string;
  groups?: GroupId[];
}

export interface PrevalenceRow {
  theme: string;
  matched: Record<GroupId, number>;
  prevalence: Record<GroupId, number>;
}

export interface DistributionRow {
  question: string;
  counts: Record<GroupId, number>;
  total: number;
}

export interface LengthStats {
  count: number;
  mean: number;
  variance: number;
}

export interface ResponseLengthRow {
  theme: string;
  stats: Record<GroupId, LengthStats>;
}

export type ComparisonView =
  | { method: "Theme Prevalence"; groups: GroupId[]; rows: PrevalenceRow[] }
  | { method: "Question Distribution"; theme: string; groups: GroupId[]; rows: DistributionRow[] }
  | { method: "Response Length"; groups: GroupId[]; rows: ResponseLengthRow[] };

// Persistence
export interface ProjectSummary {
  id: number;
  name: string;
  description: string;
  parameters: AnalysisParameters;
  // Options the counts were classified with
  classification: ClassificationOptions;
  createdAt: string;
}

export interface StoredProject {
  project: ProjectSummary;
  groups: GroupData[];
  taxonomy: Taxonomy;
  counts: ThemeQuestionCounts[][];
}

// The single source of truth for "current analysis"
export interface AnalysisResult {
  readonly project: ProjectSummary | null;
  readonly parameters: AnalysisParameters;
  readonly classification: ClassificationOptions;
  readonly groups: readonly GroupData[];
  readonly taxonomy: Taxonomy;
  readonly counts: readonly (readonly ThemeQuestionCounts[])[];
}
