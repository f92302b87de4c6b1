#!/usr/bin/env node
/**
 * tnames CLI — the main entry point.
 *
 * Commands: render, check
 */
import { renderCmd } from "./commands/render.js";
import { checkCmd } from "./commands/check.js";

const USAGE = `
tnames — tensor name header generator

Commands:
  render           Render a tensor name header from a request file
  check            Validate a request file

Options:
  --input=PATH     Request JSON ({ headerGuard?, numTensors?, tensorList })
  --out=PATH       Output header (render; stdout when omitted)
  --guard=NAME     Header guard, emitted as _NAME
  --strict         Validate before rendering
  --logLevel=LVL   debug | info | warn | error
  --config=PATH    JSON file with defaults for any option
  --help, -h       Show this help

Examples:
  tnames render --input=model.tensors.json --out=include/tensor_names.hpp
  tnames check --input=model.tensors.json
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "render") {
    process.exitCode = await renderCmd(args.slice(1));
  } else if (command === "check") {
    process.exitCode = await checkCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
