import { z } from "zod";

export const directionSchema = z.enum(["left", "right", "straight"]);

export const navigationModeSchema = z.enum(["demo", "camera"]);

export const startNavigationSchema = z
  .object({
    mode: navigationModeSchema.default("demo")
  })
  .default({});

export type StartNavigationPayload = z.input<typeof startNavigationSchema>;

export const cameraAnalysisSchema = z.object({
  distance: z.number().finite().nonnegative(),
  direction: directionSchema,
  confidence: z.number().min(0).max(1).optional(),
  leftEdges: z.number().int().nonnegative().optional(),
  rightEdges: z.number().int().nonnegative().optional(),
  instruction: z.string().min(1).max(200),
  obstacleDetected: z.boolean().optional()
});

export type CameraAnalysisPayload = z.infer<typeof cameraAnalysisSchema>;

export const navigationStateSchema = z.object({
  isRunning: z.boolean(),
  mode: navigationModeSchema,
  distance: z.number(),
  direction: z.union([directionSchema, z.literal("")]),
  lastInstruction: z.string(),
  obstacleDetected: z.boolean(),
  confidence: z.number().nullable(),
  updatedAt: z.number().nullable()
});

export const navigationErrorSchema = z.object({
  error: z.string(),
  message: z.string()
});

export type NavigationErrorPayload = z.infer<typeof navigationErrorSchema>;

/**
 * Flattens zod issues into one line such as `distance: Expected number, received string`.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
