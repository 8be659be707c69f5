/**
 * Fleet runtime: wires config, planner, risk learning, collaborators,
 * dispatch and the tick loop into one object the HTTP layer talks to.
 */

import type { RestrictedZone } from "@skyroute/types";
import {
  CostModel,
  RiskEstimator,
  RoutePlanner,
  ZoneSpatialIndex,
  createSeededRandom,
  describeError,
  type ElevationProvider,
  type RandomSource,
} from "@skyroute/routing";
import {
  DispatchService,
  VehicleScheduler,
  WeatherMonitor,
  type FleetConfig,
  type WeatherFetcher,
} from "@skyroute/fleet";

export interface FleetRuntimeDeps {
  config: FleetConfig;
  zones?: RestrictedZone[];
  elevation?: ElevationProvider;
  weather?: WeatherFetcher;
  /** Source for random task destinations (default Math.random) */
  random?: RandomSource;
}

export class FleetRuntime {
  readonly config: FleetConfig;
  readonly zones: RestrictedZone[];
  readonly planner: RoutePlanner;
  readonly riskEstimator: RiskEstimator;
  readonly dispatch: DispatchService;
  readonly scheduler: VehicleScheduler;
  readonly weather: WeatherMonitor | undefined;
  private started = false;

  constructor(deps: FleetRuntimeDeps) {
    const { config } = deps;
    this.config = config;
    this.zones = deps.zones ?? [];

    const { seed, ...riskOptions } = config.risk;
    this.riskEstimator = new RiskEstimator({
      ...riskOptions,
      ...(seed !== undefined ? { random: createSeededRandom(seed) } : {}),
    });

    this.planner = new RoutePlanner(
      {
        costModel: new CostModel(config.costWeights),
        riskEstimator: this.riskEstimator,
        ...(this.zones.length > 0 ? { spatialIndex: new ZoneSpatialIndex(this.zones) } : {}),
        ...(deps.elevation ? { elevationProvider: deps.elevation } : {}),
      },
      config.planner,
    );

    this.weather = deps.weather
      ? new WeatherMonitor(deps.weather, {
          pollIntervalMs: config.weather.pollIntervalMs,
          timeoutMs: config.weather.timeoutMs,
        })
      : undefined;

    this.dispatch = new DispatchService(
      {
        planner: this.planner,
        riskEstimator: this.riskEstimator,
        ...(this.weather ? { weather: this.weather } : {}),
      },
      {
        base: config.base,
        serviceArea: config.serviceArea,
        vehicleIds: config.vehicles,
        speedMetersPerSecond: config.scheduler.speedMetersPerSecond,
        ...(deps.random ? { random: deps.random } : {}),
      },
    );

    this.scheduler = new VehicleScheduler(() => this.dispatch.agents, {
      tickIntervalMs: config.scheduler.tickIntervalMs,
      speedMetersPerSecond: config.scheduler.speedMetersPerSecond,
      taskFactory: this.dispatch.taskFactory,
      assign: (vehicleId, taskId) => this.dispatch.assignTask(vehicleId, taskId),
      onForcedIdle: (vehicleId, taskId, reason) => this.dispatch.releaseForcedTask(vehicleId, taskId, reason),
    });
  }

  get isStarted(): boolean {
    return this.started;
  }

  /** Start weather polling, hand out initial tasks if configured, then start ticking */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    this.weather?.start();

    if (this.config.scheduler.dispatchOnStart) {
      for (const vehicleId of this.config.vehicles) {
        try {
          const result = await this.dispatch.dispatchNext(vehicleId);
          if (result.status === "no-route") {
            console.warn(`[runtime] No initial route for ${vehicleId}: ${result.message}`);
          }
        } catch (err) {
          console.error(`[runtime] Initial dispatch for ${vehicleId} failed: ${describeError(err)}`);
        }
      }
    }

    this.scheduler.start((vehicleId, taskId) => this.dispatch.completeDelivery(vehicleId, taskId));
    console.log(`[runtime] Fleet of ${this.config.vehicles.length} started`);
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    await this.scheduler.stop();
    await this.weather?.stop();
    console.log("[runtime] Fleet stopped");
  }
}
