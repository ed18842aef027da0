import { z } from "zod";

import { annotation_formats, type AnnotationFormat } from "./dataset";
import { ConfigError } from "./errors";
import { formatIssues } from "./schema";

export const DEFAULT_FORMAT: AnnotationFormat = "damm";
export const DEFAULT_TRAIN_SPLIT = 0.8;

export const convertOptionsSchema = z.object({
  /** root directory holding the annotation files and the images */
  input: z.string().min(1),
  output: z.string().min(1),
  /** annotation files to read, found under `input` when omitted */
  inputFiles: z.array(z.string().min(1)).nonempty().optional(),
  format: z.enum(annotation_formats).default(DEFAULT_FORMAT),
  createClasses: z.boolean().default(true),
  yoloStructure: z.boolean().default(false),
  trainSplit: z.number().min(0).max(1).default(DEFAULT_TRAIN_SPLIT),
  /** split seed, a fresh one is drawn when omitted */
  seed: z.number().int().nonnegative().max(0xffffffff).optional(),
  /** also write data.yaml (only with yoloStructure) */
  dataYaml: z.boolean().default(false),
});

export type ConvertOptionsInput = z.input<typeof convertOptionsSchema>;
export type ConvertOptions = z.output<typeof convertOptionsSchema>;

export function parseConvertOptions(options: unknown): ConvertOptions {
  const result = convertOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigError(
      `Invalid options: ${formatIssues(result.error.issues)}`
    );
  }
  return result.data;
}
