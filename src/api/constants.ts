/**
 * Constants sourced from the FoxESS Open API and its web client.
 */
export const API_HOST = 'https://www.foxesscloud.com';
export const DEVICE_LIST_PATH = '/op/v0/device/list';
export const REALTIME_QUERY_PATH = '/op/v0/device/real/query';
export const USER_AGENT = 'FoxESSCmdLine/1.0';
export const REQUEST_TIMEOUT_MS = 30_000;
export const DEVICE_LIST_PAGE_SIZE = 10;

export const STATIC_HEADERS: Record<string, string> = {
  'Accept': 'application/json, text/plain, */*',
  'Accept-Language': 'en-US;q=0.9,en;q=0.8',
  'Content-Type': 'application/json',
  'lang': 'en',
  'User-Agent': USER_AGENT,
};

// Vendor spellings, "Temperation" included.
export const REALTIME_VARIABLES = [
  'generationPower',
  'pvPower',
  'feedinPower',
  'gridConsumptionPower',
  'loadsPower',
  'batChargePower',
  'batDischargePower',
  'SoC',
  'batTemperature',
  'ambientTemperation',
  'invTemperation',
  'meterPower2',
] as const;
