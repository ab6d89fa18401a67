import 'dotenv/config';
import { ApiClient } from '../src/api/ApiClient';
import { TelemetrySession } from '../src/api/TelemetrySession';
import { createConsoleLogger } from '../src/logger';
import { loadSettings } from '../src/settings';

const log = createConsoleLogger('integration', true);

async function main() {
  const { apiKey, baseURL } = loadSettings(process.env);

  if (!apiKey) {
    log.error('Please create a .env file and provide FOXESS_API_KEY.');
    process.exit(1);
  }

  log.info('Starting FoxESS integration test...');
  const session = new TelemetrySession(apiKey, new ApiClient(log, { baseURL }), log);

  try {
    log.info('Checking API key...');
    if (!(await session.testAuthentication())) {
      log.error('API key was rejected or the cloud is unreachable.');
      process.exit(1);
    }
    log.info('API key accepted.');

    const devices = await session.listDevices();
    log.info(`Discovered ${devices.length} devices:`);
    console.log(JSON.stringify(devices, null, 2));

    const device = devices[0];
    if (!device) {
      log.warn('No devices found, skipping real-time query.');
      return;
    }

    log.info(`Fetching real-time data for ${device.deviceSN}...`);
    const points = await session.fetchRealtime(device.deviceSN);
    console.log(JSON.stringify(points, null, 2));
  } catch (error) {
    log.error('An error occurred during the integration test:', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  log.error('Integration test crashed:', error);
  process.exit(1);
});
