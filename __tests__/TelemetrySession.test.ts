import { Logging } from 'homebridge';
import nock from 'nock';
import { ApiClient } from '../src/api/ApiClient';
import { API_HOST, DEVICE_LIST_PATH, REALTIME_QUERY_PATH, REALTIME_VARIABLES } from '../src/api/constants';
import { DeviceNotFoundInResponseError, NotAuthenticatedError } from '../src/api/errors';
import { TelemetrySession } from '../src/api/TelemetrySession';

const mockLogger = {
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
} as unknown as Logging;

describe('TelemetrySession', () => {
  let session: TelemetrySession;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    jest.clearAllMocks();
    nock.cleanAll();
    session = new TelemetrySession('KEY1', new ApiClient(mockLogger), mockLogger);
  });

  describe('authenticate', () => {
    it('starts unauthenticated and authenticates without touching the network', () => {
      expect(session.isAuthenticated).toBe(false);
      session.authenticate();
      expect(session.isAuthenticated).toBe(true);
    });

    it('rejects authenticated calls made before authenticate()', async () => {
      await expect(session.listDevices()).rejects.toBeInstanceOf(NotAuthenticatedError);
      await expect(session.fetchRealtime('SN001')).rejects.toBeInstanceOf(NotAuthenticatedError);
    });
  });

  describe('testAuthentication', () => {
    it('returns true when the device list call succeeds', async () => {
      const scope = nock(API_HOST)
        .post(DEVICE_LIST_PATH)
        .matchHeader('token', 'KEY1')
        .reply(200, { errno: 0, result: { data: [] } });

      await expect(session.testAuthentication()).resolves.toBe(true);
      expect(session.isAuthenticated).toBe(true);
      expect(scope.isDone()).toBe(true);
    });

    it('returns false when the vendor rejects the key', async () => {
      nock(API_HOST).post(DEVICE_LIST_PATH).reply(200, { errno: 40256 });

      await expect(session.testAuthentication()).resolves.toBe(false);
      expect(mockLogger.debug).toHaveBeenCalledWith('Authentication test failed: Server error 40256');
    });

    it('returns false when the cloud is unreachable', async () => {
      nock(API_HOST).post(DEVICE_LIST_PATH).replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED' });

      await expect(session.testAuthentication()).resolves.toBe(false);
    });
  });

  describe('listDevices', () => {
    beforeEach(() => {
      session.authenticate();
    });

    it('requests page 1 of 10 and returns the devices in order', async () => {
      const scope = nock(API_HOST)
        .post(DEVICE_LIST_PATH, { currentPage: 1, pageSize: 10 })
        .matchHeader('token', 'KEY1')
        .reply(200, {
          errno: 0,
          result: {
            currentPage: 1,
            pageSize: 10,
            total: 2,
            data: [
              { deviceSN: 'SN001', stationName: 'Home', stationID: 'st-1', moduleSN: 'M1', deviceType: 'H1-5.0-E', hasPV: true, hasBattery: true },
              { deviceSN: 'SN002', stationName: null },
            ],
          },
        });

      const devices = await session.listDevices();

      expect(devices).toEqual([
        { deviceSN: 'SN001', stationName: 'Home', stationID: 'st-1', moduleSN: 'M1', deviceType: 'H1-5.0-E', hasPV: true, hasBattery: true },
        { deviceSN: 'SN002', stationName: '', stationID: '', moduleSN: '', deviceType: '', hasPV: false, hasBattery: false },
      ]);
      expect(scope.isDone()).toBe(true);
    });
  });

  describe('fetchRealtime', () => {
    const block = (deviceSN: string, soc: number) => ({
      deviceSN,
      datas: [{ variable: 'SoC', value: soc, name: 'SoC', unit: '%' }],
    });

    beforeEach(() => {
      session.authenticate();
    });

    it('queries the fixed metric list and returns the block for the requested serial', async () => {
      const scope = nock(API_HOST)
        .post(REALTIME_QUERY_PATH, { deviceSN: 'B', variables: [...REALTIME_VARIABLES] })
        .reply(200, { errno: 0, result: [block('A', 10), block('B', 80)] });

      const points = await session.fetchRealtime('B');

      expect(points).toEqual([{ key: 'SoC', value: { kind: 'numeric', value: 80 }, displayName: 'SoC', unit: '%' }]);
      expect(scope.isDone()).toBe(true);
    });

    it('fails with DeviceNotFoundInResponseError when the serial is missing', async () => {
      nock(API_HOST).post(REALTIME_QUERY_PATH).reply(200, { errno: 0, result: [block('A', 10)] });

      const promise = session.fetchRealtime('B');

      await expect(promise).rejects.toBeInstanceOf(DeviceNotFoundInResponseError);
      await expect(promise).rejects.toThrow('No data found for device B');
    });

    it('keeps heterogeneous values in their own variants', async () => {
      nock(API_HOST)
        .post(REALTIME_QUERY_PATH)
        .reply(200, {
          errno: 0,
          result: [{
            deviceSN: 'SN001',
            datas: [
              { variable: 'runningState', value: 'normal', name: 'Running State' },
              { variable: 'meterPower2', value: null, name: 'Meter2 Power', unit: 'kW' },
              { variable: 'invTemperation', value: 41.5, unit: null },
            ],
          }],
        });

      const points = await session.fetchRealtime('SN001');

      expect(points).toEqual([
        { key: 'runningState', value: { kind: 'textual', value: 'normal' }, displayName: 'Running State' },
        { key: 'meterPower2', value: { kind: 'unrecognized' }, displayName: 'Meter2 Power', unit: 'kW' },
        { key: 'invTemperation', value: { kind: 'numeric', value: 41.5 }, displayName: 'invTemperation' },
      ]);
    });
  });
});
