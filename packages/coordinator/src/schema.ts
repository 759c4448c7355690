import { z } from "zod";

// Server status as last reported by the network layer
export const SERVER_STATUSES = ["unknown", "online", "busy", "unreachable"] as const;
export const ServerStatusSchema = z.enum(SERVER_STATUSES);
export type ServerStatus = z.infer<typeof ServerStatusSchema>;

// Every action the console knows about, in toolbar order
export const ACTION_NAMES = [
  "find",
  "add",
  "remove",
  "moveTop",
  "moveUp",
  "moveDown",
  "moveBottom",
  "identify",
  "configure",
  "reference",
  "capture",
  "copy",
  "export",
  "clear",
  "refresh",
  "quit",
] as const;
export const ActionNameSchema = z.enum(ACTION_NAMES);
export type ActionName = z.infer<typeof ActionNameSchema>;

// Actions executed by the servers themselves
export const SERVER_ACTIONS = ["identify", "configure", "reference", "capture", "copy"] as const;
export type ServerActionName = (typeof SERVER_ACTIONS)[number];

// Actions handled by the image pipeline
export const IMAGE_ACTIONS = ["export", "clear"] as const;
export type ImageActionName = (typeof IMAGE_ACTIONS)[number];

// Fleet entry; position is the index in the fleet list, never a field
export const ServerEntrySchema = z.object({
  id: z.string().trim().min(1),
  label: z.string(),
  status: ServerStatusSchema.default("unknown"),
});
export type ServerEntry = z.infer<typeof ServerEntrySchema>;
export type ServerEntryInput = z.input<typeof ServerEntrySchema>;

// Captured image; ownerId is a weak reference to a fleet entry
export const ImageRecordSchema = z.object({
  id: z.string().min(1),
  ownerId: z.string().min(1),
  capturedAt: z.string(), // ISO timestamp
  handle: z.string(), // opaque, owned by the image pipeline
  orphaned: z.boolean().default(false),
});
export type ImageRecord = z.infer<typeof ImageRecordSchema>;
export type ImageRecordInput = z.input<typeof ImageRecordSchema>;

// Camera settings carried by `configure`
export const ResolutionSchema = z
  .string()
  .regex(/^\d+x\d+$/i, "Resolution must look like WIDTHxHEIGHT")
  .transform((value) => value.toLowerCase());

export const FramerateSchema = z.union([
  z.number().positive(),
  z.string().regex(/^\d+(\.\d+)?(\/[1-9]\d*)?$/, "Framerate must be a number or a fraction"),
]);

export const CameraSettingsSchema = z
  .object({
    resolution: ResolutionSchema.optional(),
    framerate: FramerateSchema.optional(),
  })
  .refine((settings) => settings.resolution !== undefined || settings.framerate !== undefined, {
    message: "At least one of resolution or framerate is required",
  });
export type CameraSettings = z.infer<typeof CameraSettingsSchema>;
export type CameraSettingsInput = z.input<typeof CameraSettingsSchema>;

// Reply to a status query: one server's camera settings and clock
export const ServerReportSchema = z.object({
  id: z.string().min(1),
  resolution: ResolutionSchema,
  framerate: FramerateSchema,
  timestamp: z.string().datetime({ offset: true }),
});
export type ServerReport = z.infer<typeof ServerReportSchema>;
export type ServerReportInput = z.input<typeof ServerReportSchema>;

// Per-server result of a dispatched batch
export const ActionOutcomeSchema = z.object({
  id: z.string().min(1),
  ok: z.boolean(),
  reason: z.string().optional(),
  images: z.array(ImageRecordSchema).optional(),
});
export type ActionOutcome = z.infer<typeof ActionOutcomeSchema>;

// Completion reported back by the executor or the image pipeline
export const ActionResultSchema = z.object({
  dispatchId: z.number().int().positive(),
  action: ActionNameSchema,
  outcomes: z.array(ActionOutcomeSchema),
});
export type ActionResult = z.infer<typeof ActionResultSchema>;
export type ActionResultInput = z.input<typeof ActionResultSchema>;

// Asynchronous status report from the network layer
export const StatusUpdateSchema = z.object({
  id: z.string().min(1),
  status: ServerStatusSchema,
});
export type StatusUpdate = z.infer<typeof StatusUpdateSchema>;
