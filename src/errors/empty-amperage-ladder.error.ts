import { Data } from "effect";

export class EmptyAmperageLadderError extends Data.TaggedError('EmptyAmperageLadder')<{
  chargerId: number;
}> {
  public override readonly message = `Charger ${this.chargerId} reported no possible amperage limits`;
}
