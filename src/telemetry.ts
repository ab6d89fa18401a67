import { asNumber } from './api/dynamicValue';
import { Device, TelemetryPoint } from './api/types';

export const SOLAR_KEYS = ['generationPower', 'pvPower'];
/** Solar readings at or below this (in the reading's own unit) are sensor noise. */
export const SOLAR_NOISE_THRESHOLD = 0.02;

export type GridDirection = 'import' | 'export';
export type BatteryDirection = 'charging' | 'discharging';

export interface BatterySummary {
  flow: number;
  direction: BatteryDirection;
  stateOfCharge: number;
}

export interface PowerSummary {
  generationPower: number;
  pvPower: number;
  loadsPower: number;
  gridFlow: number;
  gridDirection: GridDirection;
  battery?: BatterySummary;
}

export function findPoint(points: TelemetryPoint[], key: string): TelemetryPoint | undefined {
  const wanted = key.toLowerCase();
  return points.find(p => p.key.toLowerCase() === wanted);
}

export function numericValue(points: TelemetryPoint[], key: string): number | undefined {
  const point = findPoint(points, key);
  return point ? asNumber(point.value) : undefined;
}

export function unitFor(points: TelemetryPoint[], key: string): string {
  return (findPoint(points, key)?.unit ?? '').replace('°C', 'C');
}

export function clampSolarNoise(key: string, value: number): number {
  const isSolar = SOLAR_KEYS.some(k => k.toLowerCase() === key.toLowerCase());
  return isSolar && value <= SOLAR_NOISE_THRESHOLD ? 0 : value;
}

export function summarize(points: TelemetryPoint[], device: Device): PowerSummary {
  const valueOf = (key: string) => numericValue(points, key) ?? 0;

  const gridFlow = valueOf('gridConsumptionPower') - valueOf('feedinPower');
  const summary: PowerSummary = {
    generationPower: clampSolarNoise('generationPower', valueOf('generationPower')),
    pvPower: clampSolarNoise('pvPower', valueOf('pvPower')),
    loadsPower: valueOf('loadsPower'),
    gridFlow,
    gridDirection: gridFlow > 0 ? 'import' : 'export',
  };

  if (device.hasBattery) {
    const flow = valueOf('batChargePower') - valueOf('batDischargePower');
    summary.battery = {
      flow,
      direction: flow > 0 ? 'charging' : 'discharging',
      stateOfCharge: valueOf('SoC'),
    };
  }

  return summary;
}
