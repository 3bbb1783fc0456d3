import { Command } from "commander";
import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { aggregate } from "./lib/aggregator";
import { matchPrepared, prepareTaxonomy } from "./lib/question-classifier";
import { openContext, reportFailure, resolveProject, type CommonOptions } from "./commands/shared";
import type { AnalysisResult, ComparisonView, GroupId } from "./types";

interface BuildDataOptions extends CommonOptions {
  output: string;
}

export const buildDataCommand = new Command("build-data")
  .description("Generate static JSON data files for the dashboard")
  .argument("[project-id]", "Project id (default: current project)")
  .option("-o, --output <dir>", "Output directory", "dist/data")
  .option("--config <path>", "Path to analysis-config.json")
  .option("-d, --debug", "Enable debug output")
  .action(buildData);

async function buildData(projectId: string | undefined, options: BuildDataOptions) {
  try {
    const { db, session } = await openContext(options);
    const result = resolveProject(session, projectId);

    console.log(`🏗️  Building dashboard data for ${result.project?.name ?? "current analysis"}`);
    const files = await buildDashboardData(result, options.output);
    console.log(`✅ Dashboard data built in ${options.output} (${files.length} files)`);
    db.close();
  } catch (error) {
    reportFailure(error);
  }
}

/**
 * Write the dashboard's JSON files for one analysis and return their paths.
 */
export async function buildDashboardData(
  result: AnalysisResult,
  outputDir: string
): Promise<string[]> {
  await mkdir(join(outputDir, "indexes"), { recursive: true });
  const written: string[] = [];
  const write = async (relativePath: string, data: unknown) => {
    const path = join(outputDir, relativePath);
    await writeJson(path, data);
    written.push(path);
  };

  // 1. Metadata
  await write("meta.json", {
    project: result.project,
    parameters: result.parameters,
    classification: result.classification,
    generatedAt: new Date().toISOString(),
    stats: {
      groups: result.groups.length,
      records: result.groups.reduce((sum, g) => sum + g.records.length, 0),
      themes: result.taxonomy.size,
    },
    groups: result.groups.map(g => ({ group: g.group, records: g.records.length, sourceFile: g.sourceFile })),
  });

  // 2. Taxonomy in discovery order
  await write(
    "themes.json",
    [...result.taxonomy.values()].map((theme, position) => ({ ...theme, position }))
  );

  // 3. Question counts, keyed by group then theme
  const counts: Record<GroupId, Record<string, unknown>> = {};
  for (const groupCounts of result.counts) {
    for (const entry of groupCounts) {
      counts[entry.group] ??= {};
      counts[entry.group][entry.themeName] = { total: entry.total, questions: entry.questions };
    }
  }
  await write("counts.json", counts);

  // 4. Every comparison, with one distribution per theme
  const compare = (method: ComparisonView["method"], theme?: string) =>
    aggregate(result.groups, result.taxonomy, result.counts, { method, theme }, result.classification);
  const distributions: Record<string, ComparisonView> = {};
  for (const theme of result.taxonomy.keys()) {
    distributions[theme] = compare("Question Distribution", theme);
  }
  await write("comparisons.json", {
    prevalence: compare("Theme Prevalence"),
    responseLength: compare("Response Length"),
    distributions,
  });

  // 5. Theme -> respondent index
  await write("indexes/theme-respondents.json", themeRespondents(result));

  return written;
}

function themeRespondents(result: AnalysisResult) {
  const prepared = prepareTaxonomy(result.taxonomy);
  const index: Record<string, Record<GroupId, string[]>> = {};
  for (const { theme } of prepared) {
    index[theme.name] = Object.fromEntries(result.groups.map(g => [g.group, []]));
  }

  for (const group of result.groups) {
    for (const record of group.records) {
      for (const theme of matchPrepared(record, prepared, result.classification)) {
        const ids = index[theme.name][group.group];
        if (!ids.includes(record.respondentId)) ids.push(record.respondentId);
      }
    }
  }
  return index;
}

async function writeJson(path: string, data: unknown) {
  await writeFile(path, JSON.stringify(data, null, 2));
}
