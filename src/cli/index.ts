#!/usr/bin/env node

/**
 * CLI entry point for rfclink
 * Handles command-line argument parsing and user interaction
 */

import "dotenv/config";
import { Command } from "commander";
import { linkCommand } from "./commands/link";
import { renderCommand } from "./commands/render";
import { serveCommand } from "./commands/serve";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("rfclink")
  .description("Link RFC and Internet-Draft citations and serve domain posture reports")
  .version("0.1.0");

// Link command - turn citations in text into HTML links
program
  .command("link [text]")
  .description("Print text as HTML with RFC and draft citations linked")
  .option("-f, --file <path>", "Read text from a file instead of the argument")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--host <host>", "Link RFCs to datatracker or rfc-editor")
  .action(linkCommand);

// Render command - fetch one report and write the page
program
  .command("render <domain>")
  .description("Fetch a domain report from the backend and render its page")
  .option("-o, --output <path>", "Write the page to a file instead of stdout")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(renderCommand);

// Serve command - run the web front end
program
  .command("serve")
  .description("Start the web front end")
  .option("-p, --port <port>", "Port to listen on")
  .option("-H, --host <host>", "Address to bind")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(serveCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
