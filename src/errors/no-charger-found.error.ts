import { Data } from "effect";

export class NoChargerFoundError extends Data.TaggedError('NoChargerFound') {
  public override readonly message = 'No home chargers found.';
}
