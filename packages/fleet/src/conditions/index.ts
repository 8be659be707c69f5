export {
  WeatherMonitor,
  type WeatherFetcher,
  type WeatherProvider,
  type WeatherMonitorOptions,
} from "./weather-monitor.js";
