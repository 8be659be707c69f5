import { z } from "zod";

const CoordinateSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

export const CreateTaskRequestSchema = z.object({
  /** Drop-off point; a random spot in the service area when omitted */
  destination: CoordinateSchema.optional(),
});

export type CreateTaskRequest = z.infer<typeof CreateTaskRequestSchema>;

export const AssignTaskRequestSchema = z.object({
  vehicleId: z.string().min(1),
});

export type AssignTaskRequest = z.infer<typeof AssignTaskRequestSchema>;

export const AbortDeliveryRequestSchema = z.object({
  reason: z.string().min(1).optional(),
});

export type AbortDeliveryRequest = z.infer<typeof AbortDeliveryRequestSchema>;
