import { z } from "zod";

/** A decoded QR code reported by the camera adapter */
export const scanRequestSchema = z.object({
  waypointId: z.string().min(1),
  /** Sensor time in ms; defaults to server receipt time */
  timestamp: z.number().finite().optional(),
});

export type ScanRequest = z.infer<typeof scanRequestSchema>;

/** A parsed GPS fix */
export const positionRequestSchema = z.object({
  lat: z.number(),
  lng: z.number(),
  timestamp: z.number().finite().optional(),
  /** Metres above sea level, when the receiver reports it */
  altitude: z.number().finite().optional(),
});

export type PositionRequest = z.infer<typeof positionRequestSchema>;

/** Either a waypoint code, or raw speech for the command parser */
export const destinationRequestSchema = z.union([
  z.object({ waypointId: z.string().min(1) }),
  z.object({ spoken: z.string().min(1) }),
]);

export type DestinationRequest = z.infer<typeof destinationRequestSchema>;

export const guidanceQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).optional(),
});

export type GuidanceQuery = z.infer<typeof guidanceQuerySchema>;
