import type { Pipeline, ResultField, UnitAddress } from "./types.js";

/**
 * Result keys follow `<pipeline>_root.block.<segment>_<field>`, where the
 * segment is `unit[<Kind> <Name>]` for a sequential unit stage and
 * `layer[<stageIndex>].unit[<Kind> <Name>]` for a member of a layer stage.
 *
 * @example
 * resultKey(address, "choice")
 * // "QualityControl_root.block.layer[0].unit[CategoricalJudge QualityJudge]_choice"
 */
export function resultKey(address: UnitAddress, field: ResultField): string {
  return `${unitPath(address)}_${field}`;
}

export function unitPath(address: UnitAddress): string {
  const unitSegment = `unit[${address.unitKind} ${address.unitName}]`;
  const segment = address.inLayer
    ? `layer[${String(address.stageIndex)}].${unitSegment}`
    : unitSegment;
  return `${address.pipeline}_root.block.${segment}`;
}

export function addressesOf(pipeline: Pipeline): readonly UnitAddress[] {
  const addresses: UnitAddress[] = [];

  pipeline.stages.forEach((stage, stageIndex) => {
    const units = stage.kind === "unit" ? [stage.unit] : stage.units;
    for (const unit of units) {
      addresses.push({
        pipeline: pipeline.name,
        stageIndex,
        inLayer: stage.kind === "layer",
        unitKind: unit.kind,
        unitName: unit.name,
      });
    }
  });

  return addresses;
}

/**
 * Computes a unit's address from the pipeline shape alone, so callers can
 * derive keys before running anything.
 */
export function addressOf(pipeline: Pipeline, unitName: string): UnitAddress {
  const address = addressesOf(pipeline).find((a) => a.unitName === unitName);
  if (!address) {
    throw new Error(`Unit "${unitName}" is not part of pipeline "${pipeline.name}"`);
  }
  return address;
}

export function keyFor(pipeline: Pipeline, unitName: string, field: ResultField): string {
  return resultKey(addressOf(pipeline, unitName), field);
}
