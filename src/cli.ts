import yargs from "yargs";

import {
  DEFAULT_FORMAT,
  DEFAULT_TRAIN_SPLIT,
  type ConvertOptionsInput,
} from "./config";
import { convertDataset } from "./convert";
import { annotation_formats } from "./dataset";
import { createConsoleLogger, type Logger } from "./logger";

export function parseCliArgs(argv: string[]): ConvertOptionsInput & {
  verbose: boolean;
} {
  const args = yargs(argv)
    .scriptName("coco-yolo-convert")
    .usage("$0 -i <input> -o <output> [options]")
    .option("input", {
      alias: "i",
      type: "string",
      demandOption: true,
      desc: "Input directory containing the JSON annotation files and images",
    })
    .option("output", {
      alias: "o",
      type: "string",
      demandOption: true,
      desc: "Output directory for the YOLO label files",
    })
    .option("format", {
      choices: annotation_formats,
      default: DEFAULT_FORMAT,
      desc: "'standard' for COCO annotation files, 'damm' for the DAMM dataset format",
    })
    .option("create-classes", {
      type: "boolean",
      default: true,
      desc: "Write classes.txt with one placeholder name per category id",
    })
    .option("yolo-structure", {
      type: "boolean",
      default: false,
      desc: "Write {train,val}/{images,labels} and copy the images",
    })
    .option("train-split", {
      type: "number",
      default: DEFAULT_TRAIN_SPLIT,
      desc: "Share of images that go to train (with --yolo-structure)",
    })
    .option("seed", {
      type: "number",
      desc: "Seed of the train/val split, for repeatable runs",
    })
    .option("data-yaml", {
      type: "boolean",
      default: false,
      desc: "Also write data.yaml (with --yolo-structure)",
    })
    .option("verbose", {
      alias: "v",
      type: "boolean",
      default: false,
      desc: "Print one line per generated label file",
    })
    .strict()
    .help()
    .parseSync();

  return {
    input: args.input,
    output: args.output,
    format: args.format,
    createClasses: args["create-classes"],
    yoloStructure: args["yolo-structure"],
    trainSplit: args["train-split"],
    seed: args.seed,
    dataYaml: args["data-yaml"],
    verbose: args.verbose,
  };
}

/** Run one conversion from command-line arguments, resolving to the exit code. */
export async function runCli(
  argv: string[],
  logger?: Logger
): Promise<number> {
  const { verbose, ...options } = parseCliArgs(argv);
  logger ??= createConsoleLogger({ verbose });

  logger.info("Converting COCO format to YOLO format...");
  try {
    await convertDataset(options, logger);
    return 0;
  } catch (error) {
    logger.error(
      `Error: ${error instanceof Error ? error.message : String(error)}`
    );
    return 1;
  }
}
