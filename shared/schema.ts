import { z } from "zod";

export const OPTION_COUNT = 5;

// A labelled point on the coordinate plane, as [x, y]
export const pointSchema = z.tuple([z.number().int(), z.number().int()]);

export type Point = z.infer<typeof pointSchema>;

export const pointsDataSchema = z.record(z.string().length(1), pointSchema);

export type PointsData = z.infer<typeof pointsDataSchema>;

export const assessmentItemSchema = z
  .object({
    question: z.string().min(1),
    options: z
      .array(z.string().min(1))
      .length(OPTION_COUNT)
      .refine((options) => new Set(options).size === options.length, {
        message: "Options must be pairwise distinct",
      }),
    correctIndex: z.number().int().min(0).max(OPTION_COUNT - 1),
    explanation: z.string().min(1),
    subject: z.string(),
    unit: z.string(),
    topic: z.string(),
    difficulty: z.string(),
    hasImage: z.boolean(),
    pointsData: pointsDataSchema.optional(),
  })
  .refine((item) => item.pointsData === undefined || item.hasImage, {
    message: "pointsData is only allowed on items that need an image",
    path: ["pointsData"],
  });

export type AssessmentItem = z.infer<typeof assessmentItemSchema>;

export interface CurriculumPlacement {
  subject: string;
  unit: string;
  topic: string;
}
