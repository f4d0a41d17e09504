import { Schema } from "effect";

// Anything other than IDLE or CHARGING is folded into OTHER.
export const ChargingStatusSchema = Schema.transform(
  Schema.String,
  Schema.Literal("IDLE", "CHARGING", "OTHER"),
  {
    strict: true,
    decode: (status) => (status === "IDLE" || status === "CHARGING" ? status : "OTHER"),
    encode: (status) => status,
  },
);

export type ChargingStatus = typeof ChargingStatusSchema.Type;

export const ChargerStatusSchema = Schema.Struct({
  chargerId: Schema.propertySignature(Schema.Int).pipe(Schema.fromKey("charger_id")),
  amperageLimit: Schema.propertySignature(Schema.Int).pipe(Schema.fromKey("amperage_limit")),
  possibleAmperageLimits: Schema.propertySignature(Schema.Array(Schema.Int)).pipe(Schema.fromKey("possible_amperage_limits")),
  pluggedIn: Schema.propertySignature(Schema.Boolean).pipe(Schema.fromKey("plugged_in")),
  chargingStatus: Schema.propertySignature(ChargingStatusSchema).pipe(Schema.fromKey("charging_status")),
});

export type ChargerStatus = typeof ChargerStatusSchema.Type;

export const ChargerListResponseSchema = Schema.Struct({
  chargers: Schema.Array(Schema.Int),
});

export const AmperageLimitResponseSchema = Schema.Struct({
  status: Schema.String,
  message: Schema.optional(Schema.String),
});

export const SessionStartedResponseSchema = Schema.Struct({
  sessionId: Schema.propertySignature(Schema.Int).pipe(Schema.fromKey("session_id")),
  chargerId: Schema.propertySignature(Schema.Int).pipe(Schema.fromKey("charger_id")),
  startedAt: Schema.propertySignature(Schema.Date).pipe(Schema.fromKey("started_at")),
});

export const ChargingSessionSchema = Schema.Struct({
  sessionId: Schema.propertySignature(Schema.Int).pipe(Schema.fromKey("session_id")),
  chargerId: Schema.propertySignature(Schema.Int).pipe(Schema.fromKey("charger_id")),
  startedAt: Schema.propertySignature(Schema.Date).pipe(Schema.fromKey("started_at")),
  powerKw: Schema.propertySignature(Schema.Number).pipe(Schema.fromKey("power_kw")),
});

export type ChargingSession = typeof ChargingSessionSchema.Type;

export const UserChargingStatusResponseSchema = Schema.Struct({
  sessionId: Schema.propertySignature(Schema.OptionFromNullOr(Schema.Int)).pipe(Schema.fromKey("session_id")),
});
