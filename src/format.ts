import { Device, TelemetryPoint } from './api/types';
import { PowerSummary, clampSolarNoise, numericValue, unitFor } from './telemetry';

export const DEFAULT_DECIMALS = 2;

export function formatNumber(value: number, decimals = DEFAULT_DECIMALS): string {
  const fixed = value.toFixed(decimals);
  return fixed.includes('.') ? fixed.replace(/\.?0+$/, '') : fixed;
}

export function formatPower(value: number, decimals = DEFAULT_DECIMALS): string {
  return `${formatNumber(value, decimals)} kW`;
}

function line(...parts: string[]): string {
  return parts.join(' ').trimEnd();
}

function describeValue(point: TelemetryPoint, decimals: number): string {
  switch (point.value.kind) {
    case 'numeric':
      return formatNumber(clampSolarNoise(point.key, point.value.value), decimals);
    case 'textual':
      return point.value.value;
    case 'unrecognized':
      return 'unknown';
  }
}

export function renderSummary(device: Device, summary: PowerSummary, decimals = DEFAULT_DECIMALS): string[] {
  const lines = [
    `Device: ${device.stationName}`,
    `generationPower: ${formatPower(summary.generationPower, decimals)}`,
    `pvPower: ${formatPower(summary.pvPower, decimals)}`,
    `loadsPower: ${formatPower(summary.loadsPower, decimals)}`,
    `Grid: ${formatPower(Math.abs(summary.gridFlow), decimals)} ${summary.gridDirection}`,
  ];
  if (summary.battery) {
    lines.push(`Battery: ${formatPower(Math.abs(summary.battery.flow), decimals)} ${summary.battery.direction}`);
    lines.push(`SoC: ${formatNumber(summary.battery.stateOfCharge, decimals)}%`);
  }
  return lines;
}

export function renderAll(device: Device, points: TelemetryPoint[], decimals = DEFAULT_DECIMALS): string[] {
  const lines = [`Device: ${device.stationName}`, 'Available variables:'];
  for (const point of points) {
    lines.push(line(`  ${point.key}:`, describeValue(point, decimals), point.unit ?? ''));
  }
  return lines;
}

export function renderSelected(
  device: Device,
  points: TelemetryPoint[],
  keys: string[],
  decimals = DEFAULT_DECIMALS,
): string[] {
  const lines = [`Device: ${device.stationName}`];
  for (const key of keys) {
    const value = numericValue(points, key);
    if (value === undefined) {
      lines.push(`${key}: Not available`);
      continue;
    }
    lines.push(line(`${key}:`, formatNumber(clampSolarNoise(key, value), decimals), unitFor(points, key)));
  }
  return lines;
}
