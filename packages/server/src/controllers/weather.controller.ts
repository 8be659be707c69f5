import type { WeatherResponse } from "../models/responses.js";
import { Controller } from "./controller.js";

export class WeatherController extends Controller {
  /** Last report from the poller; null before the first successful fetch */
  public getWeather(): WeatherResponse {
    const { weather } = this.runtime;
    return {
      monitoring: weather !== undefined,
      report: weather?.getLatest() ?? null,
    };
  }
}
