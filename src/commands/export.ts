import { Command } from "commander";
import { parseComparisonMethod } from "../lib/analysis-config";
import { exportReport } from "../lib/report-export";
import { openContext, reportFailure, resolveProject, splitList, type CommonOptions } from "./shared";

interface ExportOptions extends CommonOptions {
  format?: string;
  method?: string;
  theme?: string;
  groups?: string;
  output?: string;
}

export const exportCommand = new Command("export")
  .description("Export a project's themes, counts and a comparison to Excel, CSV or PDF")
  .argument("[project-id]", "Project id (default: current project)")
  .option("-f, --format <format>", "Excel, CSV or PDF (default from config)")
  .option("-m, --method <method>", "Comparison to include (default from config)")
  .option("-t, --theme <name>", "Theme for Question Distribution (default: first theme)")
  .option("-g, --groups <names>", "Comma-separated groups to include (default: all)")
  .option("-o, --output <path>", "Output file (extension added when missing)")
  .option("--config <path>", "Path to analysis-config.json")
  .option("-d, --debug", "Enable debug output")
  .action(exportProject);

async function exportProject(projectId: string | undefined, options: ExportOptions) {
  try {
    const { config, db, session } = await openContext(options);
    const result = resolveProject(session, projectId);

    const view = session.compare({
      method: parseComparisonMethod(options.method ?? config.analysis.comparisonMethod),
      theme: options.theme,
      groups: splitList(options.groups),
    });

    const output = options.output ?? `exports/project-${result.project?.id ?? "current"}`;
    const format = options.format ?? config.analysis.exportFormat;

    console.log(`📤 Exporting ${result.project?.name ?? "current analysis"} as ${format}`);
    const written = await exportReport(result, view, format, output);
    for (const path of written) {
      console.log(`   ${path}`);
    }
    console.log("✅ Export complete");
    db.close();
  } catch (error) {
    reportFailure(error);
  }
}
