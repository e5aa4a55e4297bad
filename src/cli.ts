#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { introspectCmd } from "./commands/introspect.js";
import { generateCmd } from "./commands/generate.js";

const program = new Command();

program
  .name("rowforge")
  .description("Synthetic, referentially valid rows for relational schemas")
  .version("0.1.0");

program.addCommand(introspectCmd());
program.addCommand(generateCmd());

await program.parseAsync(process.argv);
