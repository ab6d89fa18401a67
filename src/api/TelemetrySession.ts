import { Logging } from 'homebridge';
import { ApiClient } from './ApiClient';
import { DEVICE_LIST_PAGE_SIZE, DEVICE_LIST_PATH, REALTIME_QUERY_PATH, REALTIME_VARIABLES } from './constants';
import { DeviceNotFoundInResponseError, NotAuthenticatedError } from './errors';
import {
  Device,
  DeviceListRequest,
  PagedDeviceListSchema,
  RealtimeQueryRequest,
  RealtimeResponseSchema,
  TelemetryPoint,
} from './types';

/**
 * One account's view of the FoxESS cloud. The API key doubles as the bearer
 * token, so authenticating is a local step; only calls that reach the network
 * can reveal a bad key.
 */
export class TelemetrySession {
  private token?: string;

  constructor(
    private readonly apiKey: string,
    private readonly client: ApiClient,
    private readonly log: Logging,
  ) {}

  public get isAuthenticated(): boolean {
    return this.token !== undefined;
  }

  public authenticate(): void {
    this.log.debug('Setting API key as token');
    this.token = this.apiKey;
  }

  /** Authenticates and makes one device-list call. Any failure, bad key or unreachable host, reads as false. */
  public async testAuthentication(): Promise<boolean> {
    this.log.debug('Testing authentication');
    this.authenticate();
    try {
      await this.listDevices();
      return true;
    } catch (error) {
      this.log.debug(`Authentication test failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  public async listDevices(): Promise<Device[]> {
    const token = this.requireToken();
    this.log.debug('Fetching device list');

    const body: DeviceListRequest = { currentPage: 1, pageSize: DEVICE_LIST_PAGE_SIZE };
    const page = await this.client.request(DEVICE_LIST_PATH, 'POST', body, PagedDeviceListSchema, { token });
    return page.data;
  }

  public async fetchRealtime(deviceSerial: string): Promise<TelemetryPoint[]> {
    const token = this.requireToken();
    this.log.debug(`Fetching real-time data for ${deviceSerial}`);

    const body: RealtimeQueryRequest = { deviceSN: deviceSerial, variables: REALTIME_VARIABLES };
    const blocks = await this.client.request(REALTIME_QUERY_PATH, 'POST', body, RealtimeResponseSchema, { token });

    // Blocks for other devices may come back, in any order.
    const block = blocks.find(b => b.deviceSN === deviceSerial);
    if (!block) {
      throw new DeviceNotFoundInResponseError(deviceSerial);
    }
    return block.datas;
  }

  private requireToken(): string {
    if (this.token === undefined) {
      throw new NotAuthenticatedError();
    }
    return this.token;
  }
}
