import { Command } from "commander";
import { registerExtractCommand } from "./commands/extract.js";
import { registerTextCommand } from "./commands/text.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("docmeta")
    .description("Extract titles, keywords, summaries, entities and sections from documents")
    .version("1.0.0");

  registerExtractCommand(program);
  registerTextCommand(program);

  return program;
}
