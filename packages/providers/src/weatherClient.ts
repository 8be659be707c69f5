import type { Coordinate, WeatherReport } from "@skyroute/types";
import type { WeatherFetcher } from "@skyroute/fleet";
import { CollaboratorError } from "@skyroute/routing";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import { WeatherResponseSchema } from "./types.js";

export interface WeatherClientConfig extends ClientConfig {
  /** Where to ask about */
  location: Coordinate;
  units?: "standard" | "metric" | "imperial";
  /** Epoch ms for report timestamps (default Date.now) */
  clock?: () => number;
}

/** Current weather from an OpenWeather-style `/weather` endpoint */
export class WeatherClient implements WeatherFetcher {
  private client: BaseClient;
  private location: Coordinate;
  private units: string;
  private now: () => number;

  constructor(config: WeatherClientConfig) {
    this.client = new BaseClient("weather", "weather", { apiKeyParam: "appid", ...config });
    this.location = config.location;
    this.units = config.units ?? "metric";
    this.now = config.clock ?? Date.now;
  }

  /** Latest report; category is the first `weather[].main`, or "unknown" */
  public async fetchLatest(): Promise<WeatherReport> {
    const raw = await this.client.get<unknown>({
      query: { lat: this.location.lat, lon: this.location.lng, units: this.units },
    });
    const parsed = WeatherResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CollaboratorError("weather", "malformed response");
    }
    const category = parsed.data.weather?.[0]?.main ?? "unknown";
    return { category, raw, fetchedAt: this.now() };
  }
}
