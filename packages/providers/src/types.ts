/**
 * Upstream response shapes, validated on arrival.
 */

import { z } from "zod";

/** Google Elevation API style response */
export const ElevationResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        elevation: z.number(),
        resolution: z.number().optional(),
        location: z.object({ lat: z.number(), lng: z.number() }).optional(),
      }),
    )
    .default([]),
});

export type ElevationResponse = z.infer<typeof ElevationResponseSchema>;

/** OpenWeather current-weather style response; only the fields we read are checked */
export const WeatherResponseSchema = z
  .object({
    weather: z
      .array(
        z.object({
          main: z.string(),
          description: z.string().optional(),
        }),
      )
      .optional(),
  })
  .passthrough();

export type WeatherResponse = z.infer<typeof WeatherResponseSchema>;
