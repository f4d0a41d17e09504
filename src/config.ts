import { Config as EffectConfig, Duration } from "effect";


export const AppConfig = {
  charger: {
    apiUrl: EffectConfig.string("CHARGER_API_URL"),
    apiToken: EffectConfig.redacted("CHARGER_API_TOKEN"),
    chargerId: EffectConfig.option(EffectConfig.integer("CHARGER_ID")),
    amperageRetries: EffectConfig.integer("CHARGER_AMPERAGE_RETRIES").pipe(
      EffectConfig.withDefault(4)
    ),
    amperagePollDelay: EffectConfig.duration("CHARGER_AMPERAGE_POLL_DELAY").pipe(
      EffectConfig.withDefault(Duration.seconds(1))
    ),
  },

  influx: {
    protocol: EffectConfig.literal("http", "https")("INFLUX_PROTOCOL").pipe(
      EffectConfig.withDefault("http")
    ),
    host: EffectConfig.string("INFLUX_HOST").pipe(EffectConfig.withDefault("localhost")),
    port: EffectConfig.integer("INFLUX_PORT").pipe(EffectConfig.withDefault(8086)),
    username: EffectConfig.string("INFLUX_USERNAME"),
    password: EffectConfig.redacted("INFLUX_PASSWORD"),
    database: EffectConfig.string("INFLUX_DATABASE").pipe(EffectConfig.withDefault("pvs6")),
  },

  telemetry: {
    measurement: EffectConfig.string("TELEMETRY_MEASUREMENT").pipe(EffectConfig.withDefault("sunpower_power")),
    productionField: EffectConfig.string("TELEMETRY_PRODUCTION_FIELD").pipe(EffectConfig.withDefault("pv_p")),
    gridField: EffectConfig.string("TELEMETRY_GRID_FIELD").pipe(EffectConfig.withDefault("net_p")),
    // stored values are kW
    unitScale: EffectConfig.number("TELEMETRY_UNIT_SCALE").pipe(EffectConfig.withDefault(1000)),
  },

  metrics: {
    measurement: EffectConfig.string("METRICS_MEASUREMENT").pipe(EffectConfig.withDefault("solar_charge_control")),
  },

  control: {
    controlIntervalMinutes: EffectConfig.integer("CONTROL_INTERVAL_MINUTES").pipe(EffectConfig.withDefault(5)),
    slopeWindowMinutes: EffectConfig.integer("SLOPE_WINDOW_MINUTES").pipe(EffectConfig.withDefault(30)),
    tickIntervalSeconds: EffectConfig.integer("TICK_INTERVAL_SECONDS").pipe(EffectConfig.withDefault(60)),
    voltage: EffectConfig.number("CHARGER_VOLTAGE").pipe(EffectConfig.withDefault(240)),
    lowProductionThresholdWatts: EffectConfig.number("LOW_PRODUCTION_THRESHOLD_WATTS").pipe(
      EffectConfig.withDefault(500)
    ),
  },

  logging: {
    file: EffectConfig.string("LOG_FILE").pipe(EffectConfig.withDefault("solar_charge_controller.log")),
  },
};
