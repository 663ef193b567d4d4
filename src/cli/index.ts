#!/usr/bin/env node

/**
 * CLI entry point for mdanchor
 * Handles command-line argument parsing
 */

import { Command } from "commander";
import { renderCommand } from "./commands/render";
import { tocCommand } from "./commands/toc";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("mdanchor")
  .description("Render Markdown to HTML with unique, CJK-aware heading ids")
  .version("0.1.0");

// Main render command (default action)
program
  .argument("[file]", "Markdown file to render (reads stdin when omitted)")
  .option("--json", "Write a JSON document with the HTML and heading list")
  .option("--pretty", "Indent JSON output")
  .option("--diagnostics", "Report headings that fell back to the default slug")
  .option("--fallback-slug <slug>", "Slug for headings with no sluggable text")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output on stderr")
  .action(renderCommand);

// TOC command - heading table through a template
program
  .command("toc [file]")
  .description("Print a table of contents for a Markdown document")
  .option("-t, --template <path>", "Handlebars template for the table")
  .option("--fallback-slug <slug>", "Slug for headings with no sluggable text")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output on stderr")
  .action(tocCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
