import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";

export type Db = Database.Database;

export function openDb(path: string): Db {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);

  // Enable WAL mode for better concurrent access
  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");

  // Initialize schema
  initSchema(db);

  return db;
}

export function initSchema(db: Db) {
  db.exec(`
    -- One row per saved analysis
    CREATE TABLE IF NOT EXISTS projects (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      min_theme_freq INTEGER NOT NULL CHECK(min_theme_freq >= 1),
      num_themes INTEGER NOT NULL CHECK(num_themes >= 1),
      extraction_method TEXT NOT NULL CHECK(extraction_method IN ('TF-IDF Clustering', 'Keyword Extraction', 'Topic Modeling')),
      similarity_floor REAL NOT NULL DEFAULT 0 CHECK(similarity_floor >= 0 AND similarity_floor <= 1),
      max_themes_per_record INTEGER NOT NULL DEFAULT 0 CHECK(max_themes_per_record >= 0),
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    -- Taxonomy of a project, position = discovery order
    CREATE TABLE IF NOT EXISTS themes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      project_id INTEGER NOT NULL,
      name TEXT NOT NULL,
      keywords_json TEXT NOT NULL, -- JSON array, ranked
      frequency INTEGER NOT NULL DEFAULT 0,
      position INTEGER NOT NULL,
      method TEXT NOT NULL,
      UNIQUE (project_id, name),
      FOREIGN KEY (project_id) REFERENCES projects(id) ON DELETE CASCADE
    );

    -- Groups and their records, as loaded
    CREATE TABLE IF NOT EXISTS project_groups (
      project_id INTEGER NOT NULL,
      group_id TEXT NOT NULL,
      position INTEGER NOT NULL,
      source_file TEXT,
      record_count INTEGER NOT NULL,
      PRIMARY KEY (project_id, group_id),
      FOREIGN KEY (project_id) REFERENCES projects(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS interview_records (
      project_id INTEGER NOT NULL,
      group_id TEXT NOT NULL,
      position INTEGER NOT NULL,
      question TEXT NOT NULL,
      response TEXT NOT NULL,
      respondent_id TEXT NOT NULL,
      PRIMARY KEY (project_id, group_id, position),
      FOREIGN KEY (project_id, group_id) REFERENCES project_groups(project_id, group_id) ON DELETE CASCADE
    );

    -- Matched records per theme per group
    CREATE TABLE IF NOT EXISTS theme_distribution (
      theme_id INTEGER NOT NULL,
      group_id TEXT NOT NULL,
      matched_records INTEGER NOT NULL,
      total_records INTEGER NOT NULL,
      PRIMARY KEY (theme_id, group_id),
      FOREIGN KEY (theme_id) REFERENCES themes(id) ON DELETE CASCADE
    );

    -- Question occurrences per theme per group
    CREATE TABLE IF NOT EXISTS question_counts (
      theme_id INTEGER NOT NULL,
      group_id TEXT NOT NULL,
      question_text TEXT NOT NULL,
      count INTEGER NOT NULL CHECK(count >= 0),
      PRIMARY KEY (theme_id, group_id, question_text),
      FOREIGN KEY (theme_id) REFERENCES themes(id) ON DELETE CASCADE
    );

    -- Small key/value store for the CLI session (current project)
    CREATE TABLE IF NOT EXISTS app_state (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    -- Indexes for performance
    CREATE INDEX IF NOT EXISTS idx_themes_project ON themes(project_id, position);
    CREATE INDEX IF NOT EXISTS idx_records_group ON interview_records(project_id, group_id);
    CREATE INDEX IF NOT EXISTS idx_question_counts_theme ON question_counts(theme_id);
  `);

  // Databases created before projects stored their classification options
  const columns = new Set(
    db.prepare<[], { name: string }>("SELECT name FROM pragma_table_info('projects')").all().map(c => c.name)
  );
  if (!columns.has("similarity_floor")) {
    db.exec("ALTER TABLE projects ADD COLUMN similarity_floor REAL NOT NULL DEFAULT 0");
  }
  if (!columns.has("max_themes_per_record")) {
    db.exec("ALTER TABLE projects ADD COLUMN max_themes_per_record INTEGER NOT NULL DEFAULT 0");
  }
}

// Transaction helper
export function withTransaction<T>(db: Db, fn: () => T): T {
  const tx = db.transaction(fn);
  return tx();
}
