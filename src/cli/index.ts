#!/usr/bin/env node
/**
 * CLI entrypoint — Commander-based CLI for postline.
 * Commands: init, build, archive, defaults, permalink, paginate, validate, serve
 */

import { Command } from "commander";
import chalk from "chalk";
import { existsSync, writeFileSync } from "node:fs";
import { Postline } from "../index.js";
import { isoDay } from "../archive/templates.js";
import type { ArchiveGroup } from "../archive/group.js";
import { startMcpServer } from "../mcp/index.js";

const program = new Command();

program
  .name("postline")
  .description("Resolve a static blog's posts, permalinks and archives")
  .version("0.1.0");

function printWarnings(site: Postline) {
  for (const w of site.warnings) console.log(chalk.yellow(`  ${w}`));
}

function printGroups(groups: ArchiveGroup[]) {
  for (const group of groups) {
    console.log(chalk.bold(`${group.name} (${group.entries.length})`));
    for (const entry of group.entries) {
      const day = entry.date ? isoDay(entry.date) : "          ";
      console.log(`  ${day}  ${entry.title}  ${chalk.dim(entry.url)}`);
    }
  }
}

// init
program
  .command("init")
  .description("Create a _config.yml in the current directory")
  .option("--title <title>", "Site title", "My Blog")
  .option("--paginate <n>", "Posts per index page", "6")
  .action((opts) => {
    if (existsSync("_config.yml")) {
      console.log(chalk.yellow("_config.yml already exists"));
      return;
    }

    writeFileSync(
      "_config.yml",
      `title: ${JSON.stringify(opts.title)}
permalink: /blog/:year/:month/:day/:title:output_ext
paginate: ${Number(opts.paginate)}
paginate_path: "/blog/page:num/"
show_excerpts: true
include:
  - _pages

defaults:
  - scope:
      path: ""
      type: pages
    values:
      layout: single
  - scope:
      path: ""
      type: posts
    values:
      layout: post
      comments: true
`,
      "utf-8"
    );
    console.log(chalk.green("Created _config.yml"));
  });

// build
program
  .command("build")
  .description("Resolve the site, write category archive fragments and the build manifest")
  .option("-r, --root <dir>", "Site root", ".")
  .option("-c, --config <path>", "Config file path")
  .option("-o, --out <dir>", "Archive fragment directory")
  .action(async (opts) => {
    const site = Postline.load(opts.root, opts.config);
    printWarnings(site);
    const model = await site.build();
    const written = site.write(model, opts.out);

    console.log(chalk.green("Build complete:"));
    console.log(`  Posts:      ${model.posts.length}`);
    console.log(`  Pages:      ${model.pages.length}`);
    console.log(`  Categories: ${model.categories.length}`);
    console.log(`  Tags:       ${model.tags.length}`);
    console.log(`  Index pages: ${model.pagination.length}`);
    console.log(`  Fragments:  ${written.fragments.length}`);
    if (written.removedFragments.length) {
      console.log(`  Removed fragments: ${written.removedFragments.length}`);
    }
    if (model.skipped.length) {
      console.log(chalk.yellow(`  Skipped: ${model.skipped.length}`));
      model.skipped.forEach((s) => console.log(`    ${s.relativePath} (${s.reason})`));
    }
    const { added, changed, removed } = written.diff;
    console.log(`  Added: ${added.length}  Changed: ${changed.length}  Removed: ${removed.length}`);
    if (model.issues.length) {
      console.log(chalk.red(`  Issues: ${model.issues.length}`));
      model.issues.forEach((i) => console.log(`    ${i.file ?? ""} ${i.message}`));
    }
  });

// archive
program
  .command("archive")
  .description("Print the category (or tag) archive listing")
  .option("-r, --root <dir>", "Site root", ".")
  .option("-c, --config <path>", "Config file path")
  .option("--tags", "Group by tag instead of category")
  .option("--json", "Print JSON")
  .action(async (opts) => {
    const site = Postline.load(opts.root, opts.config);
    const model = await site.build();
    const groups = opts.tags ? model.tags : model.categories;
    if (opts.json) {
      console.log(JSON.stringify(groups, null, 2));
    } else if (groups.length === 0) {
      console.log(chalk.yellow(opts.tags ? "No tags" : "No categories"));
    } else {
      printGroups(groups);
    }
  });

// defaults
program
  .command("defaults")
  .description("Show a document's effective metadata after defaults are applied")
  .argument("<file>", "Document path relative to the site root")
  .option("-r, --root <dir>", "Site root", ".")
  .option("-c, --config <path>", "Config file path")
  .action((file, opts) => {
    const site = Postline.load(opts.root, opts.config);
    console.log(JSON.stringify(site.metadata(file), null, 2));
  });

// permalink
program
  .command("permalink")
  .description("Show the published URL of a document")
  .argument("<file>", "Document path relative to the site root")
  .option("-r, --root <dir>", "Site root", ".")
  .option("-c, --config <path>", "Config file path")
  .action((file, opts) => {
    const site = Postline.load(opts.root, opts.config);
    console.log(site.resolve(file).url);
  });

// paginate
program
  .command("paginate")
  .description("Show the post index pages")
  .option("-r, --root <dir>", "Site root", ".")
  .option("-c, --config <path>", "Config file path")
  .option("-p, --page <n>", "Only this page")
  .action(async (opts) => {
    const site = Postline.load(opts.root, opts.config);
    const model = await site.build();
    if (model.pagination.length === 0) {
      console.log(chalk.yellow("Pagination is off (set `paginate` in the config)"));
      return;
    }
    const pages = opts.page
      ? model.pagination.filter((p) => p.page === Number(opts.page))
      : model.pagination;
    for (const page of pages) {
      console.log(chalk.bold(`Page ${page.page}/${page.totalPages}`));
      page.posts.forEach((p) => console.log(`  ${p.title}  ${chalk.dim(p.url)}`));
      if (page.previousPagePath) console.log(`  prev: ${page.previousPagePath}`);
      if (page.nextPagePath) console.log(`  next: ${page.nextPagePath}`);
    }
  });

// validate
program
  .command("validate")
  .description("Validate the site config")
  .option("-r, --root <dir>", "Site root", ".")
  .option("-c, --config <path>", "Config file path")
  .action((opts) => {
    try {
      const site = Postline.load(opts.root, opts.config);
      console.log(chalk.green("Valid"));
      printWarnings(site);
    } catch (e) {
      console.log(chalk.red(e instanceof Error ? e.message : String(e)));
      process.exitCode = 1;
    }
  });

// serve (MCP server)
program
  .command("serve")
  .description("Start the MCP server (stdio transport)")
  .option("-r, --root <dir>", "Site root", ".")
  .option("-c, --config <path>", "Config file path")
  .action(async (opts) => {
    await startMcpServer(opts.root, opts.config);
  });

program.parseAsync().catch((e: unknown) => {
  console.error(chalk.red(e instanceof Error ? e.message : String(e)));
  process.exitCode = 1;
});
