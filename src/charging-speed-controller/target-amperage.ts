import { Data } from "effect";
import { decide, highestStep, minimumExcessWatts, type AmperageLadder } from "./amperage-decider.js";

export type TargetAmperage = Data.TaggedEnum<{
  // The solar signal is not trustworthy at trace production.
  LowProduction: { readonly amperage: number; readonly productionW: number };
  ExcessSolar: { readonly amperage: number; readonly predictedExcessW: number };
  InsufficientExcess: { readonly amperage: number; readonly predictedExcessW: number; readonly minimumW: number };
}>;

export const TargetAmperage = Data.taggedEnum<TargetAmperage>();

type TargetAmperageInput = {
  readonly productionW: number;
  readonly predictedExcessW: number;
  readonly ladder: AmperageLadder;
  readonly voltage: number;
  readonly lowProductionThresholdW: number;
};

export const determineTargetAmperage = ({
  productionW,
  predictedExcessW,
  ladder,
  voltage,
  lowProductionThresholdW,
}: TargetAmperageInput): TargetAmperage => {
  if (productionW < lowProductionThresholdW) {
    return TargetAmperage.LowProduction({ amperage: highestStep(ladder), productionW });
  }

  const minimumW = minimumExcessWatts(ladder, voltage);

  if (predictedExcessW >= minimumW) {
    return TargetAmperage.ExcessSolar({ amperage: decide(predictedExcessW, ladder, voltage), predictedExcessW });
  }

  return TargetAmperage.InsufficientExcess({ amperage: 0, predictedExcessW, minimumW });
};
