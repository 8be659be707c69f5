/**
 * Operating conditions that drive the learned risk multiplier.
 */

/** Conditions a route is planned under */
export interface FlightConditions {
  /** Weather category, e.g. "Clear", "Rain" */
  weather?: string;
  /** Coarse elevation band label */
  elevationBand?: string;
}

/** Last known weather, as returned by a weather provider */
export interface WeatherReport {
  /** Short category used for risk keys ("Clear", "Clouds", "unknown", ...) */
  category: string;
  /** Provider payload, untouched */
  raw: unknown;
  /** When the report was fetched (epoch ms) */
  fetchedAt: number;
}

/** Outcome of a delivery, fed back into the risk estimator */
export type DeliveryOutcome = "success" | "failure";
