import { Command } from "commander";
import { parseComparisonMethod } from "../lib/analysis-config";
import { comparisonTable, renderTable } from "../lib/report-export";
import { openContext, reportFailure, resolveProject, splitList, type CommonOptions } from "./shared";

interface CompareOptions extends CommonOptions {
  method?: string;
  theme?: string;
  groups?: string;
}

export const compareCommand = new Command("compare")
  .description("Compare themes across the groups of a project")
  .argument("[project-id]", "Project id (default: current project)")
  .option("-m, --method <method>", "Theme Prevalence, Question Distribution or Response Length")
  .option("-t, --theme <name>", "Theme for Question Distribution (default: first theme)")
  .option("-g, --groups <names>", "Comma-separated groups to include (default: all)")
  .option("--config <path>", "Path to analysis-config.json")
  .option("-d, --debug", "Enable debug output")
  .action(compareProject);

async function compareProject(projectId: string | undefined, options: CompareOptions) {
  try {
    const { config, db, session } = await openContext(options);
    const result = resolveProject(session, projectId);

    const view = session.compare({
      method: parseComparisonMethod(options.method ?? config.analysis.comparisonMethod),
      theme: options.theme,
      groups: splitList(options.groups),
    });

    console.log(`📊 ${result.project?.name ?? "Current analysis"}`);
    if (!view) {
      console.log("⚠️  The project has no themes to compare");
    } else {
      const heading = view.method === "Question Distribution" ? `${view.method}: ${view.theme}` : view.method;
      console.log(`   ${heading}\n`);
      console.log(renderTable(comparisonTable(view)));
    }
    db.close();
  } catch (error) {
    reportFailure(error);
  }
}
