import { z } from "zod";

const nonNegativeInt = z.number().int().nonnegative();

// ---------------- standard (COCO) ----------------

/** [x, y, width, height] */
const cocoBboxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

export const cocoImageSchema = z.object({
  id: nonNegativeInt,
  file_name: z.string(),
  width: nonNegativeInt,
  height: nonNegativeInt,
});

export const cocoAnnotationSchema = z.object({
  id: nonNegativeInt,
  image_id: nonNegativeInt,
  category_id: nonNegativeInt,
  bbox: cocoBboxSchema,
  // area, iscrowd and segmentation are accepted but never read
  area: z.number().optional(),
  iscrowd: z.number().optional(),
  segmentation: z.unknown().optional(),
});

export const cocoDatasetSchema = z.object({
  images: z.array(cocoImageSchema),
  annotations: z.array(cocoAnnotationSchema),
  categories: z.array(z.unknown()).optional(),
});

export type CocoImage = z.infer<typeof cocoImageSchema>;
export type CocoAnnotation = z.infer<typeof cocoAnnotationSchema>;
export type CocoDataset = z.infer<typeof cocoDatasetSchema>;

// ---------------- DAMM ----------------

const pointSchema = z.tuple([z.number(), z.number()]);

/** [[x1, y1], [x2, y2]] */
const dammBboxSchema = z.tuple([pointSchema, pointSchema]);

export const dammAnnotationSchema = z.object({
  bbox: dammBboxSchema,
  category_id: nonNegativeInt,
  // e.g. "BoxMode.XYXY_ABS", never interpreted
  bbox_mode: z.string().nullish(),
  segmentation: z.unknown().optional(),
});

export const dammImageSchema = z.object({
  file_name: z.string(),
  width: nonNegativeInt,
  height: nonNegativeInt,
  image_id: nonNegativeInt,
  annotations: z.array(dammAnnotationSchema),
});

export const dammDatasetSchema = z.object({
  annotations: z.array(dammImageSchema),
});

export type DammAnnotation = z.infer<typeof dammAnnotationSchema>;
export type DammImage = z.infer<typeof dammImageSchema>;
export type DammDataset = z.infer<typeof dammDatasetSchema>;

export function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
