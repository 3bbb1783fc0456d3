import { Command } from "commander";
import type { GroupSource } from "../lib/analysis-session";
import { InvalidParametersError } from "../lib/errors";
import { groupNameFromFile } from "../lib/record-store";
import { comparisonTable, renderTable } from "../lib/report-export";
import { openContext, reportFailure, splitList, type CommonOptions } from "./shared";

interface ProcessOptions extends CommonOptions {
  group?: string;
  description?: string;
  minFreq?: string;
  numThemes?: string;
  method?: string;
  compare?: string;
  theme?: string;
  save: boolean;
}

export const processCommand = new Command("process")
  .description("Discover themes across interview groups and count the questions behind them")
  .argument("<name>", "Project name")
  .argument("<files...>", "One CSV or Excel file per group")
  .option("-g, --group <names>", "Comma-separated group names, in file order (default: file names)")
  .option("--description <text>", "Project description")
  .option("-f, --min-freq <n>", "Minimum theme frequency")
  .option("-n, --num-themes <n>", "Maximum number of themes")
  .option("-m, --method <method>", "Extraction method (TF-IDF Clustering, Keyword Extraction, Topic Modeling)")
  .option("--compare <method>", "Comparison to print (Theme Prevalence, Question Distribution, Response Length)")
  .option("-t, --theme <name>", "Theme for Question Distribution")
  .option("--config <path>", "Path to analysis-config.json")
  .option("-d, --debug", "Enable debug output")
  .option("--no-save", "Do not store the project")
  .action(processInterviews);

async function processInterviews(name: string, files: string[], options: ProcessOptions) {
  try {
    const { config, db, session } = await openContext(options);
    const defaults = config.analysis;

    const sources = groupSources(files, splitList(options.group));

    console.log(`🚀 Processing "${name}"`);
    const outcome = await session.process({
      name,
      description: options.description,
      sources,
      parameters: {
        minThemeFreq: options.minFreq !== undefined ? Number(options.minFreq) : defaults.minThemeFreq,
        numThemes: options.numThemes !== undefined ? Number(options.numThemes) : defaults.numThemes,
        extractionMethod: options.method ?? defaults.extractionMethod,
      },
      comparison: { method: options.compare ?? defaults.comparisonMethod, theme: options.theme },
      save: options.save,
    });

    for (const notice of outcome.notices) {
      console.warn(`⚠️  ${notice.message}`);
    }

    console.log(`\n📋 Themes (${outcome.result.taxonomy.size})`);
    for (const theme of outcome.result.taxonomy.values()) {
      console.log(`   - ${theme.name} [${theme.frequency}]: ${theme.keywords.join(", ")}`);
    }

    if (outcome.comparison) {
      console.log(`\n📊 ${outcome.comparison.method}`);
      console.log(renderTable(comparisonTable(outcome.comparison)));
    }
    if (outcome.comparisonError) {
      console.warn(`\n⚠️  No comparison: ${outcome.comparisonError.message}`);
    }

    switch (outcome.persistence.status) {
      case "saved":
        console.log(`\n✅ Done. Project id: ${outcome.persistence.projectId}`);
        break;
      case "failed":
        console.log("\n⚠️  Done, but the project was not saved");
        break;
      case "skipped":
        console.log("\n✅ Done (not saved)");
        break;
    }

    db.close();
  } catch (error) {
    reportFailure(error);
  }
}

export function groupSources(files: readonly string[], groups: readonly string[] | undefined): GroupSource[] {
  if (groups && groups.length !== files.length) {
    throw new InvalidParametersError(`Got ${groups.length} group name(s) for ${files.length} file(s)`);
  }
  return files.map((path, i) => ({ group: groups?.[i] ?? groupNameFromFile(path), path }));
}
