import { Command } from "commander";
import { fromStoredProject } from "../lib/analysis-session";
import { openContext, parseProjectId, reportFailure, type CommonOptions } from "./shared";

export const projectsCommand = new Command("projects")
  .description("Manage saved projects");

// List subcommand
projectsCommand
  .command("list")
  .description("List saved projects (* marks the current one)")
  .option("--config <path>", "Path to analysis-config.json")
  .action(async (options: CommonOptions) => {
    try {
      const { db, repository } = await openContext(options);
      const projects = repository.loadProjects();
      const currentId = repository.getCurrentProjectId();

      if (projects.length === 0) {
        console.log("📭 No saved projects");
      } else {
        console.log(`📁 ${projects.length} project(s)`);
        for (const project of projects) {
          console.log(`   ${project.id === currentId ? "*" : " "} ${project.id}. ${project.name}`);
        }
      }
      db.close();
    } catch (error) {
      reportFailure(error);
    }
  });

// Show subcommand
projectsCommand
  .command("show")
  .description("Show a project's parameters, groups and themes")
  .argument("<project-id>", "Project id")
  .option("--config <path>", "Path to analysis-config.json")
  .action(async (projectId: string, options: CommonOptions) => {
    try {
      const { db, repository } = await openContext(options);
      const result = fromStoredProject(repository.loadProject(parseProjectId(projectId)));
      const project = result.project;

      if (project) {
        console.log(`📁 ${project.id}. ${project.name}`);
        if (project.description) console.log(`   ${project.description}`);
        console.log(`   Created: ${project.createdAt}`);
      }
      const { minThemeFreq, numThemes, extractionMethod } = result.parameters;
      console.log(`   Method: ${extractionMethod}, min frequency ${minThemeFreq}, up to ${numThemes} theme(s)`);
      const { similarityFloor, maxThemesPerRecord } = result.classification;
      console.log(`   Similarity floor ${similarityFloor}, themes per record ${maxThemesPerRecord || "unlimited"}`);

      console.log(`\n👥 Groups`);
      for (const group of result.groups) {
        console.log(`   - ${group.group}: ${group.records.length} record(s)${group.sourceFile ? ` from ${group.sourceFile}` : ""}`);
      }

      console.log(`\n📋 Themes`);
      for (const theme of result.taxonomy.values()) {
        console.log(`   - ${theme.name} [${theme.frequency}]: ${theme.keywords.join(", ")}`);
      }
      db.close();
    } catch (error) {
      reportFailure(error);
    }
  });

// Use subcommand
projectsCommand
  .command("use")
  .description("Make a project the current one")
  .argument("<project-id>", "Project id")
  .option("--config <path>", "Path to analysis-config.json")
  .action(async (projectId: string, options: CommonOptions) => {
    try {
      const { db, session } = await openContext(options);
      const result = session.load(parseProjectId(projectId));
      console.log(`✅ Current project: ${result.project?.name ?? projectId}`);
      db.close();
    } catch (error) {
      reportFailure(error);
    }
  });

// Delete subcommand
projectsCommand
  .command("delete")
  .description("Delete a project (the current project cannot be deleted)")
  .argument("<project-id>", "Project id")
  .option("--config <path>", "Path to analysis-config.json")
  .action(async (projectId: string, options: CommonOptions) => {
    try {
      const { db, session } = await openContext(options);
      const id = parseProjectId(projectId);
      if (session.deleteProject(id)) {
        console.log(`🗑️  Deleted project ${id}`);
      } else {
        console.log(`⚠️  Project ${id} does not exist`);
      }
      db.close();
    } catch (error) {
      reportFailure(error);
    }
  });
