export {
  convertOptionsSchema,
  parseConvertOptions,
  DEFAULT_FORMAT,
  DEFAULT_TRAIN_SPLIT,
} from "./config";
export type { ConvertOptions, ConvertOptionsInput } from "./config";
export { convertDataset, logConversionSummary } from "./convert";
export type { ConversionSummary } from "./convert";
export {
  ClassIndex,
  annotation_formats,
  isAnnotationFormat,
  toClassName,
} from "./dataset";
export type {
  AnnotationFormat,
  CenterBox,
  CornerBox,
  UnifiedAnnotation,
  UnifiedImage,
  YoloAnnotation,
} from "./dataset";
export { AnnotationParseError, ConfigError, DatasetIoError } from "./errors";
export {
  addCategories,
  createExportDatasetDirs,
  exportFlatLabels,
  exportYoloDataset,
  saveClassesFile,
  saveDataYamlFile,
  saveLabelFile,
  toLabelLines,
} from "./export";
export type {
  ExportFlatLabelsOptions,
  ExportFlatLabelsResult,
  ExportYoloDatasetOptions,
  ExportYoloDatasetResult,
} from "./export";
export {
  IMAGE_EXTENSIONS,
  buildImageIndex,
  findAnnotationFiles,
  resolveImage,
  scanFiles,
} from "./fs";
export type { ImageIndex } from "./fs";
export { group_types } from "./group";
export type { GroupType } from "./group";
export {
  cocoBboxToCorners,
  importAnnotationFile,
  importDataset,
  parseAnnotationContent,
  parseDammDataset,
  parseStandardDataset,
} from "./import";
export {
  formatDecimal,
  toBaseName,
  toCenterForm,
  toLabelFileContent,
  toLabelFilename,
  toStem,
  toYoloAnnotation,
  toYoloLabelString,
} from "./label";
export { Logger, createConsoleLogger, createSilentLogger } from "./logger";
export type { LoggerMethods, LogFn } from "./logger";
export { createRandom, randomSeed } from "./random";
export type { Random } from "./random";
export { countTrainSamples, shuffle, splitDataset } from "./split";
export type { DatasetSplit } from "./split";
export { toDataYamlString, toDetectYamlOptions } from "./yaml";
export type { DetectYamlOptions } from "./yaml";
