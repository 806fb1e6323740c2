/**
 * Raw values captured during one field test. Meter values are totalizer
 * readings; `totalVolume` is the reference volume measured independently of
 * the meters. `flowRate` (GPM) is informational only.
 */
export interface MeterReading {
  readonly smallMeterStart: number;
  readonly smallMeterEnd: number;
  readonly largeMeterStart: number;
  readonly largeMeterEnd: number;
  readonly totalVolume: number;
  readonly flowRate: number;
}

export function createMeterReading(values: MeterReading): MeterReading {
  return Object.freeze({
    smallMeterStart: values.smallMeterStart,
    smallMeterEnd: values.smallMeterEnd,
    largeMeterStart: values.largeMeterStart,
    largeMeterEnd: values.largeMeterEnd,
    totalVolume: values.totalVolume,
    flowRate: values.flowRate,
  });
}

/**
 * Rounds to two decimals, half away from zero.
 */
export function round2(value: number): number {
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * 100)) / 100;
  // normalize -0
  return rounded === 0 ? 0 : rounded;
}

/** Volume registered by both meters combined. */
export function meterDelta(reading: MeterReading): number {
  const smallDiff = reading.smallMeterEnd - reading.smallMeterStart;
  const largeDiff = reading.largeMeterEnd - reading.largeMeterStart;
  return smallDiff + largeDiff;
}

/**
 * Metered volume as a percentage of the reference volume, rounded to two
 * decimals. A zero reference volume yields 0.
 */
export function accuracy(reading: MeterReading): number {
  if (reading.totalVolume === 0) {
    return 0;
  }
  return round2((meterDelta(reading) / reading.totalVolume) * 100);
}
