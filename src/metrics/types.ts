import { Context, Effect } from "effect";

export type MetricField =
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'integer'; readonly value: number };

export type MetricFields = Readonly<Record<string, MetricField>>;

export const float = (value: number): MetricField => ({ type: 'float', value });
export const integer = (value: number): MetricField => ({ type: 'integer', value });

export class MetricsSink extends Context.Tag("MetricsSink")<
  MetricsSink,
  {
    /** Best effort: failures are logged, never raised. */
    readonly write: (measurement: string, fields: MetricFields) => Effect.Effect<void>;
  }>
(){}

export type IMetricsSink = Context.Tag.Service<typeof MetricsSink>;
