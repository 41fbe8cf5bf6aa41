import { z } from "zod";

import { MAX_SLIDE_COUNT } from "./docx/constants.js";

const LogLevelSchema = z.enum(["debug", "info", "warning", "error"]);

const DocxFileNameSchema = z
  .string()
  .min(1)
  .refine((name) => name.toLowerCase().endsWith(".docx"), {
    message: "must end with .docx",
  });

const SlideCountSchema = z.number().int().min(1).max(MAX_SLIDE_COUNT);

// slides.config.json
export const BuildConfigSchema = z
  .object({
    title: z.string().optional(),
    subtitle: z.string().optional(),
    slideCount: SlideCountSchema.optional(),
    outputFile: DocxFileNameSchema.optional(),
    logLevel: LogLevelSchema.optional(),
  })
  .strict();

export type BuildConfig = z.infer<typeof BuildConfigSchema>;

// CLI: build command
export const BuildArgsSchema = z.object({
  dir: z.string().min(1).optional(),
  output: DocxFileNameSchema.optional(),
  count: z.coerce.number().pipe(SlideCountSchema).optional(),
  title: z.string().optional(),
  subtitle: z.string().optional(),
  config: z.string().min(1).optional(),
  logLevel: LogLevelSchema.optional(),
});

export type BuildArgs = z.infer<typeof BuildArgsSchema>;

// CLI: inspect command
export const InspectArgsSchema = z.object({
  path: DocxFileNameSchema,
});

export type InspectArgs = z.infer<typeof InspectArgsSchema>;
