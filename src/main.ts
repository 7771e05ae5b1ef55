#!/usr/bin/env node
import fs from "fs";
import { fileURLToPath, pathToFileURL } from "url";
import { loadConfig } from "./config.js";
import { buildFromConfig, resultToJson, type Logger } from "./pipeline.js";
import { renderSvg } from "./render_svg.js";
import { SourceUnavailableError, writeText } from "./util.js";

const USAGE = "Usage: literature-graph <config.yaml> <out.json> [out.svg]";

/** Runs one build from CLI arguments; returns the process exit code. */
export function run(args: string[], log: Logger = (msg) => console.error(msg)): number {
  const [configPath, outJson, outSvg] = args;
  if (!configPath || !outJson) {
    log(USAGE);
    return 1;
  }
  try {
    const result = buildFromConfig(loadConfig(configPath), { log });
    writeText(outJson, JSON.stringify(resultToJson(result), null, 2));
    if (outSvg) {
      const css = fileURLToPath(new URL("../styles/graph.css", import.meta.url));
      writeText(outSvg, renderSvg(result.graph, css));
    }
    if (result.papers.length === 0) log("no papers found");
    return 0;
  } catch (e) {
    if (!(e instanceof SourceUnavailableError)) throw e;
    log(`${e.message} (check source_dir in the config)`);
    return 1;
  }
}

// argv[1] is the bin symlink when installed
const entry = process.argv[1];
const isMain =
  !!entry && fs.existsSync(entry) && import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
if (isMain) {
  try {
    process.exitCode = run(process.argv.slice(2));
  } catch (e) {
    console.error(e);
    process.exitCode = 1;
  }
}
