import { z } from "zod";
import type {
  AnalysisParameters,
  ClassificationOptions,
  GroupData,
  InterviewRecord,
  ProjectSummary,
  QuestionCount,
  StoredProject,
  Taxonomy,
  Theme,
  ThemeQuestionCounts,
} from "../types";
import { EXTRACTION_METHODS } from "../types";
import { withTransaction, type Db } from "./database";
import { PersistenceError, ThemeAnalysisError, errorMessage } from "./errors";
import { DEFAULT_CLASSIFICATION, matchPrepared, prepareTaxonomy } from "./question-classifier";
import { buildGroup } from "./record-store";
import { compareText } from "./extraction/shared";
import { buildTaxonomy } from "./theme-extractor";

interface ProjectRow {
  id: number;
  name: string;
  description: string;
  min_theme_freq: number;
  num_themes: number;
  extraction_method: string;
  similarity_floor: number;
  max_themes_per_record: number;
  created_at: string;
}

interface ThemeRow {
  id: number;
  name: string;
  keywords_json: string;
  frequency: number;
}

interface GroupRow {
  group_id: string;
  source_file: string | null;
}

interface RecordRow {
  question: string;
  response: string;
  respondent_id: string;
}

interface CountRow {
  theme_id: number;
  group_id: string;
  question_text: string;
  count: number;
}

const keywordsSchema = z.array(z.string()).min(1);
const methodSchema = z.enum(EXTRACTION_METHODS);

const CURRENT_PROJECT_KEY = "current_project_id";

export interface AnalysisToSave {
  name: string;
  description: string;
  parameters: AnalysisParameters;
  groups: readonly GroupData[];
  taxonomy: Taxonomy;
  counts: readonly (readonly ThemeQuestionCounts[])[];
}

/**
 * SQLite persistence for projects. Every failure of the driver surfaces
 * as a PersistenceError.
 */
export class ProjectRepository {
  constructor(private readonly db: Db) {}

  saveProject(
    name: string,
    description: string,
    parameters: AnalysisParameters,
    classification: ClassificationOptions = DEFAULT_CLASSIFICATION
  ): number {
    return this.guard("save project", () => {
      const result = this.db
        .prepare<[string, string, number, number, string, number, number]>(
          `INSERT INTO projects
             (name, description, min_theme_freq, num_themes, extraction_method, similarity_floor, max_themes_per_record)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          name,
          description,
          parameters.minThemeFreq,
          parameters.numThemes,
          parameters.extractionMethod,
          classification.similarityFloor,
          classification.maxThemesPerRecord
        );
      return Number(result.lastInsertRowid);
    });
  }

  saveThemes(projectId: number, taxonomy: Taxonomy, method: string): Map<string, number> {
    return this.guard("save themes", () => {
      const insertTheme = this.db.prepare<[number, string, string, number, number, string]>(`
        INSERT INTO themes (project_id, name, keywords_json, frequency, position, method)
        VALUES (?, ?, ?, ?, ?, ?)
      `);

      return withTransaction(this.db, () => {
        const ids = new Map<string, number>();
        [...taxonomy.values()].forEach((theme, position) => {
          const result = insertTheme.run(
            projectId,
            theme.name,
            JSON.stringify(theme.keywords),
            theme.frequency,
            position,
            method
          );
          ids.set(theme.name, Number(result.lastInsertRowid));
        });
        return ids;
      });
    });
  }

  /**
   * Store the groups with their records, and how many records of each group
   * matched each theme.
   */
  saveDistribution(
    projectId: number,
    themeIds: ReadonlyMap<string, number>,
    groups: readonly GroupData[],
    taxonomy: Taxonomy,
    options: ClassificationOptions = DEFAULT_CLASSIFICATION
  ) {
    this.guard("save distribution", () => {
      const insertGroup = this.db.prepare<[number, string, number, string | null, number]>(`
        INSERT INTO project_groups (project_id, group_id, position, source_file, record_count)
        VALUES (?, ?, ?, ?, ?)
      `);
      const insertRecord = this.db.prepare<[number, string, number, string, string, string]>(`
        INSERT INTO interview_records (project_id, group_id, position, question, response, respondent_id)
        VALUES (?, ?, ?, ?, ?, ?)
      `);
      const insertDistribution = this.db.prepare<[number, string, number, number]>(`
        INSERT OR REPLACE INTO theme_distribution (theme_id, group_id, matched_records, total_records)
        VALUES (?, ?, ?, ?)
      `);

      const prepared = prepareTaxonomy(taxonomy);

      withTransaction(this.db, () => {
        groups.forEach((group, position) => {
          insertGroup.run(projectId, group.group, position, group.sourceFile, group.records.length);

          const matched = new Map<string, number>(prepared.map(p => [p.theme.name, 0]));
          group.records.forEach((record, i) => {
            insertRecord.run(projectId, group.group, i, record.question, record.response, record.respondentId);
            for (const theme of matchPrepared(record, prepared, options)) {
              matched.set(theme.name, (matched.get(theme.name) || 0) + 1);
            }
          });

          for (const [themeName, count] of matched) {
            const themeId = themeIds.get(themeName);
            if (themeId === undefined) {
              throw new PersistenceError(`No saved id for theme "${themeName}"`);
            }
            insertDistribution.run(themeId, group.group, count, group.records.length);
          }
        });
      });
    });
  }

  saveCounts(themeIds: ReadonlyMap<string, number>, counts: readonly (readonly ThemeQuestionCounts[])[]) {
    this.guard("save question counts", () => {
      const insertCount = this.db.prepare<[number, string, string, number]>(`
        INSERT OR REPLACE INTO question_counts (theme_id, group_id, question_text, count)
        VALUES (?, ?, ?, ?)
      `);

      withTransaction(this.db, () => {
        for (const groupCounts of counts) {
          for (const entry of groupCounts) {
            const themeId = themeIds.get(entry.themeName);
            if (themeId === undefined) {
              throw new PersistenceError(`No saved id for theme "${entry.themeName}"`);
            }
            for (const question of entry.questions) {
              insertCount.run(themeId, question.group, question.questionText, question.count);
            }
          }
        }
      });
    });
  }

  // All four saves, committed together. The options are stored with the project.
  saveAnalysis(
    analysis: AnalysisToSave,
    options: ClassificationOptions = DEFAULT_CLASSIFICATION
  ): { projectId: number; themeIds: Map<string, number> } {
    return this.guard("save analysis", () =>
      withTransaction(this.db, () => {
        const projectId = this.saveProject(analysis.name, analysis.description, analysis.parameters, options);
        const themeIds = this.saveThemes(projectId, analysis.taxonomy, analysis.parameters.extractionMethod);
        this.saveDistribution(projectId, themeIds, analysis.groups, analysis.taxonomy, options);
        this.saveCounts(themeIds, analysis.counts);
        return { projectId, themeIds };
      })
    );
  }

  loadProjects(): Array<{ id: number; name: string }> {
    return this.guard("list projects", () =>
      this.db.prepare<[], { id: number; name: string }>("SELECT id, name FROM projects ORDER BY id").all()
    );
  }

  getProject(id: number): ProjectSummary | null {
    return this.guard("read project", () => {
      const row = this.db.prepare<[number], ProjectRow>("SELECT * FROM projects WHERE id = ?").get(id);
      return row ? toSummary(row) : null;
    });
  }

  loadProject(id: number): StoredProject {
    return this.guard("load project", () => {
      const project = this.getProject(id);
      if (!project) {
        throw new PersistenceError(`Project ${id} not found`);
      }

      const themeRows = this.db
        .prepare<[number], ThemeRow>(
          "SELECT id, name, keywords_json, frequency FROM themes WHERE project_id = ? ORDER BY position"
        )
        .all(id);
      const taxonomy = buildTaxonomy(themeRows.map(toTheme));

      const groupRows = this.db
        .prepare<[number], GroupRow>(
          "SELECT group_id, source_file FROM project_groups WHERE project_id = ? ORDER BY position"
        )
        .all(id);
      const selectRecords = this.db.prepare<[number, string], RecordRow>(`
        SELECT question, response, respondent_id FROM interview_records
        WHERE project_id = ? AND group_id = ?
        ORDER BY position
      `);
      const groups = groupRows.map(row =>
        buildGroup(
          row.group_id,
          selectRecords.all(id, row.group_id).map(
            (r): InterviewRecord => Object.freeze({
              question: r.question,
              response: r.response,
              respondentId: r.respondent_id,
              group: row.group_id,
            })
          ),
          row.source_file
        )
      );

      const countRows = this.db
        .prepare<[number], CountRow>(`
          SELECT qc.theme_id, qc.group_id, qc.question_text, qc.count
          FROM question_counts qc
          JOIN themes t ON t.id = qc.theme_id
          WHERE t.project_id = ?
        `)
        .all(id);

      return { project, groups, taxonomy, counts: rebuildCounts(groups, taxonomy, countRows) };
    });
  }

  deleteProject(id: number): boolean {
    return this.guard("delete project", () =>
      withTransaction(this.db, () => {
        const result = this.db.prepare<[number]>("DELETE FROM projects WHERE id = ?").run(id);
        if (this.getCurrentProjectId() === id) {
          this.setCurrentProjectId(null);
        }
        return result.changes > 0;
      })
    );
  }

  getCurrentProjectId(): number | null {
    return this.guard("read current project", () => {
      const row = this.db
        .prepare<[string], { value: string }>("SELECT value FROM app_state WHERE key = ?")
        .get(CURRENT_PROJECT_KEY);
      if (!row) return null;
      const id = Number(row.value);
      return Number.isInteger(id) ? id : null;
    });
  }

  setCurrentProjectId(id: number | null) {
    this.guard("update current project", () => {
      if (id === null) {
        this.db.prepare<[string]>("DELETE FROM app_state WHERE key = ?").run(CURRENT_PROJECT_KEY);
      } else {
        this.db
          .prepare<[string, string]>("INSERT OR REPLACE INTO app_state (key, value) VALUES (?, ?)")
          .run(CURRENT_PROJECT_KEY, String(id));
      }
    });
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof ThemeAnalysisError) throw error;
      throw new PersistenceError(`Failed to ${action}: ${errorMessage(error)}`, error);
    }
  }
}

function toSummary(row: ProjectRow): ProjectSummary {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    parameters: {
      minThemeFreq: row.min_theme_freq,
      numThemes: row.num_themes,
      extractionMethod: methodSchema.parse(row.extraction_method),
    },
    classification: {
      similarityFloor: row.similarity_floor,
      maxThemesPerRecord: row.max_themes_per_record,
    },
    createdAt: row.created_at,
  };
}

function toTheme(row: ThemeRow): Theme {
  const keywords = keywordsSchema.safeParse(JSON.parse(row.keywords_json));
  if (!keywords.success) {
    throw new PersistenceError(`Theme "${row.name}" has malformed keywords`);
  }
  return Object.freeze({
    id: row.id,
    name: row.name,
    keywords: Object.freeze(keywords.data),
    frequency: row.frequency,
  });
}

// Same shape classifyGroup produces: every theme for every group, sorted questions
function rebuildCounts(groups: GroupData[], taxonomy: Taxonomy, rows: CountRow[]): ThemeQuestionCounts[][] {
  const themeNames = new Map([...taxonomy.values()].map(theme => [theme.id, theme.name]));

  return groups.map(group =>
    [...taxonomy.values()].map(theme => {
      const questions = rows
        .filter(r => r.group_id === group.group && themeNames.get(r.theme_id) === theme.name)
        .map((r): QuestionCount => ({
          themeName: theme.name,
          questionText: r.question_text,
          group: group.group,
          count: r.count,
        }))
        .sort((a, b) => b.count - a.count || compareText(a.questionText, b.questionText));

      return {
        themeName: theme.name,
        group: group.group,
        total: questions.reduce((sum, q) => sum + q.count, 0),
        questions,
      };
    })
  );
}
