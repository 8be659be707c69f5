import type { ElevationProvider } from "@skyroute/routing";
import { CollaboratorError } from "@skyroute/routing";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import { ElevationResponseSchema } from "./types.js";

/** Ground elevation from a Google-Elevation-style `/elevation/json` endpoint */
export class ElevationClient implements ElevationProvider {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("elevation", "elevation", { apiKeyParam: "key", ...config });
  }

  /** Elevation in meters at a point */
  public async getElevation(lat: number, lng: number): Promise<number> {
    const raw = await this.client.get<unknown>({ path: "json", query: { locations: `${lat},${lng}` } });
    const parsed = ElevationResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CollaboratorError("elevation", "malformed response");
    }

    const { status, error_message: errorMessage, results } = parsed.data;
    if (status !== "OK") {
      throw new CollaboratorError("elevation", errorMessage ? `${status}: ${errorMessage}` : status);
    }
    const [first] = results;
    if (!first) {
      throw new CollaboratorError("elevation", `no result for ${lat},${lng}`);
    }
    return first.elevation;
  }
}
