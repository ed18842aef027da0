import { parseConvertOptions, type ConvertOptionsInput } from "./config";
import { ClassIndex } from "./dataset";
import { ConfigError } from "./errors";
import {
  exportFlatLabels,
  exportYoloDataset,
  saveClassesFile,
  saveDataYamlFile,
} from "./export";
import {
  buildImageIndex,
  findAnnotationFiles,
  isDirectory,
  makeDir,
} from "./fs";
import { importDataset } from "./import";
import { createConsoleLogger, Logger } from "./logger";
import { createRandom, randomSeed } from "./random";

export type ConversionSummary = {
  processedFiles: number;
  totalImages: number;
  totalAnnotations: number;
  labelFiles: number;
  /** images written to each split, only with yoloStructure */
  trainImages: number;
  valImages: number;
  copiedImages: number;
  missingImages: number;
  /** category ids, ascending */
  classes: number[];
  /** seed used for the train/val split */
  seed?: number;
  classesFile?: string;
  dataYamlFile?: string;
};

/**
 * Read every annotation file, convert the boxes to YOLO form and write the
 * label files, either flat into `output` or as a train/val image+label
 * layout. Missing images are reported in the summary, any other failure
 * rejects.
 */
export async function convertDataset(
  input: ConvertOptionsInput,
  logger: Logger = createConsoleLogger()
): Promise<ConversionSummary> {
  const options = parseConvertOptions(input);

  if (!(await isDirectory(options.input))) {
    throw new ConfigError(
      `Input directory does not exist: ${options.input}`
    );
  }

  const files =
    options.inputFiles ?? (await findAnnotationFiles(options.input));
  if (files.length === 0) {
    throw new ConfigError(
      `No annotation files (*.json) found in ${options.input}`
    );
  }

  logger.info(`Using format: ${options.format}`);
  logger.info(`Input directory: ${options.input}`);
  logger.info(`Output directory: ${options.output}`);

  await makeDir(options.output);

  const { images, processedFiles } = await importDataset({
    files,
    format: options.format,
    logger,
  });

  const class_index = new ClassIndex();
  const summary: ConversionSummary = {
    processedFiles,
    totalImages: images.length,
    totalAnnotations: 0,
    labelFiles: 0,
    trainImages: 0,
    valImages: 0,
    copiedImages: 0,
    missingImages: 0,
    classes: [],
  };

  if (options.yoloStructure) {
    const seed = options.seed ?? randomSeed();
    logger.info(
      `Splitting with train ratio ${options.trainSplit} (seed: ${seed})`
    );
    const result = await exportYoloDataset({
      images,
      export_dataset_dir: options.output,
      image_index: await buildImageIndex(options.input),
      train_ratio: options.trainSplit,
      random: createRandom(seed),
      class_index,
      logger,
    });
    summary.seed = seed;
    summary.totalAnnotations = result.annotations;
    summary.labelFiles = result.label_files;
    summary.trainImages = result.group_counts.train;
    summary.valImages = result.group_counts.val;
    summary.copiedImages = result.copied_images;
    summary.missingImages = result.missing_images;
  } else {
    const result = await exportFlatLabels({
      images,
      export_dataset_dir: options.output,
      class_index,
      logger,
    });
    summary.totalAnnotations = result.annotations;
    summary.labelFiles = result.label_files;
  }
  summary.classes = class_index.ids();

  if (options.createClasses) {
    summary.classesFile = await saveClassesFile(options.output, class_index);
    if (summary.classesFile) {
      logger.info(`Generated classes file: ${summary.classesFile}`);
    }
  }

  if (options.dataYaml) {
    if (options.yoloStructure) {
      summary.dataYamlFile = await saveDataYamlFile(
        options.output,
        class_index
      );
      logger.info(`Generated data.yaml: ${summary.dataYamlFile}`);
    } else {
      logger.warn(`data.yaml is only written with the YOLO directory layout`);
    }
  }

  logConversionSummary(logger, summary, options.yoloStructure);
  return summary;
}

export function logConversionSummary(
  logger: Logger,
  summary: ConversionSummary,
  yoloStructure: boolean
) {
  logger.info("");
  logger.info("Conversion completed!");
  logger.info(`Processed files: ${summary.processedFiles}`);
  logger.info(`Total images: ${summary.totalImages}`);
  logger.info(`Total annotations: ${summary.totalAnnotations}`);
  if (yoloStructure) {
    logger.info(`Train images: ${summary.trainImages}`);
    logger.info(`Val images: ${summary.valImages}`);
    if (summary.missingImages > 0) {
      logger.warn(`Missing images: ${summary.missingImages}`);
    }
  }
}
