import { describe, it, expect } from 'vitest';
import {
  RainPoint2ZoneTimer,
  RainPointAirSensor,
  RainPointDisplayHub,
  RainPointRainSensor,
  RainPointSoilMoistureSensor,
} from '../../../src/devices/rainpoint.js';
import { HubDevice, SubDevice, type SubDeviceProps } from '../../../src/devices/device.js';
import { DeviceStatusDecodeError } from '../../../src/utils/errors.js';

function subProps(overrides: Partial<SubDeviceProps> = {}): SubDeviceProps {
  return {
    model: 'TEST',
    modelCode: 0,
    name: 'Sensor',
    did: 'd-1',
    mid: 2001,
    alerts: null,
    address: 2,
    portNumber: null,
    ...overrides,
  };
}

function createHub(): RainPointDisplayHub {
  return new RainPointDisplayHub(
    { model: 'HWS019WRF-V2', modelCode: 264, name: 'Display', did: 'd-hub', mid: 2001, alerts: null },
    []
  );
}

describe('RainPoint devices', () => {
  describe('HomgarDevice base behaviour', () => {
    it('should ignore records for other addresses', () => {
      const sensor = new RainPointSoilMoistureSensor(subProps({ address: 2 }));
      sensor.applyStatus({ id: 'D03', value: '1,-70,1;766,52,G=31351' });
      expect(sensor.rfRssi).toBeNull();
      expect(sensor.tempMkCurrent).toBeNull();
    });

    it('should require exactly one ; separator', () => {
      const sensor = new RainPointSoilMoistureSensor(subProps());
      expect(() => sensor.applyStatus({ id: 'D02', value: '1,-70,1' })).toThrow(DeviceStatusDecodeError);
      expect(() => sensor.applyStatus({ id: 'D02', value: '1,-70,1;766,52,G=1;x' })).toThrow(
        DeviceStatusDecodeError
      );
    });

    it('should require three general fields with an integer rssi', () => {
      const sensor = new RainPointSoilMoistureSensor(subProps());
      expect(() => sensor.applyStatus({ id: 'D02', value: '1,-70;766,52,G=31351' })).toThrow(
        DeviceStatusDecodeError
      );
      expect(() => sensor.applyStatus({ id: 'D02', value: '1,weak,1;766,52,G=31351' })).toThrow(
        DeviceStatusDecodeError
      );
    });

    it('should leave the generic subdevice status ids at its address', () => {
      const device = new SubDevice(subProps({ address: 12 }));
      expect(device.getStatusIds()).toEqual(['D12']);
    });

    it('should still record rssi on generic devices', () => {
      const timer = new RainPoint2ZoneTimer(subProps({ address: 5, portNumber: 2 }));
      timer.applyStatus({ id: 'D05', value: '1,-80,1;0,9,0,0,0,0|0,1291,0,0,0,0' });
      expect(timer.rfRssi).toBe(-80);
    });
  });

  describe('RainPointDisplayHub', () => {
    it('should listen to connected, state and D01', () => {
      expect(createHub().getStatusIds()).toEqual(['connected', 'state', 'D01']);
    });

    it('should decode the D01 value', () => {
      const hub = createHub();
      hub.applyStatus({ id: 'D01', value: '1,-62,1;781(781/723/1),52(64/50/1),P=10213(10222/10205/1),' });

      expect(hub.rfRssi).toBe(-62);
      expect(hub.tempMkCurrent).toBe(298761);
      expect(hub.tempMkDailyMax).toBe(298761);
      expect(hub.tempMkDailyMin).toBe(295539);
      expect(hub.tempTrend).toBe(255428);
      expect(hub.humCurrent).toBe(52);
      expect(hub.humDailyMax).toBe(64);
      expect(hub.humDailyMin).toBe(50);
      expect(hub.humTrend).toBe(1);
      expect(hub.pressPaCurrent).toBe(10213);
      expect(hub.pressPaDailyMax).toBe(10222);
      expect(hub.pressPaDailyMin).toBe(10205);
      expect(hub.pressTrend).toBe(1);
    });

    it('should set null readings for malformed stats groups', () => {
      const hub = createHub();
      hub.applyStatus({ id: 'D01', value: '1,-62,1;--,52(64/50/1),P=--' });
      expect(hub.tempMkCurrent).toBeNull();
      expect(hub.humCurrent).toBe(52);
      expect(hub.pressPaCurrent).toBeNull();
      expect(hub.rfRssi).toBe(-62);
    });

    it('should decode state and connected', () => {
      const hub = createHub();
      hub.applyStatus({ id: 'state', value: '3,-58' });
      hub.applyStatus({ id: 'connected', value: '1' });
      expect(hub.batteryState).toBe(3);
      expect(hub.wifiRssi).toBe(-58);
      expect(hub.connected).toBe(true);

      hub.applyStatus({ id: 'connected', value: '0' });
      expect(hub.connected).toBe(false);
    });

    it('should reject a malformed state', () => {
      const hub = createHub();
      expect(() => hub.applyStatus({ id: 'state', value: '3' })).toThrow(DeviceStatusDecodeError);
      expect(() => hub.applyStatus({ id: 'state', value: '3,x' })).toThrow(DeviceStatusDecodeError);
      expect(hub.batteryState).toBeNull();
    });

    it('should reject pressure without its prefix and keep previous readings', () => {
      const hub = createHub();
      hub.applyStatus({ id: 'D01', value: '1,-62,1;781(781/723/1),52(64/50/1),P=10213(10222/10205/1),' });

      expect(() =>
        hub.applyStatus({ id: 'D01', value: '1,-40,1;700(700/700/1),40(40/40/1),10213(10222/10205/1),' })
      ).toThrow(DeviceStatusDecodeError);
      expect(hub.tempMkCurrent).toBe(298761);
      expect(hub.humCurrent).toBe(52);
      expect(hub.rfRssi).toBe(-62);
    });

    it('should describe itself with its readings', () => {
      const hub = createHub();
      expect(hub.toString()).toBe('Irrigation Display Hub "Display" (DID d-hub) with 0 subdevices');

      hub.applyStatus({ id: 'D01', value: '1,-62,1;781(781/723/1),52(64/50/1),P=10213(10222/10205/1),' });
      expect(hub.toString()).toBe(
        'Irrigation Display Hub "Display" (DID d-hub) with 0 subdevices: 298.8K / 52% / 10213Pa'
      );
    });

    it('should include readings in its snapshot', () => {
      const hub = createHub();
      hub.applyStatus({ id: 'connected', value: '1' });
      const snapshot = hub.toJSON();
      expect(snapshot.description).toBe('Irrigation Display Hub');
      expect(snapshot.address).toBe(1);
      expect(snapshot.subdevices).toEqual([]);
      expect(snapshot.readings['connected']).toBe(true);
      expect(snapshot.readings['tempMkCurrent']).toBeNull();
    });
  });

  describe('RainPointSoilMoistureSensor', () => {
    it('should decode temperature, moisture and light', () => {
      const sensor = new RainPointSoilMoistureSensor(subProps());
      sensor.applyStatus({ id: 'D02', value: '1,-70,1;766,52,G=31351' });

      expect(sensor.rfRssi).toBe(-70);
      expect(sensor.tempMkCurrent).toBe(297928);
      expect(sensor.moistPercentCurrent).toBe(52);
      expect(sensor.lightLuxCurrent).toBe(3135.1);
    });

    it('should reject a missing G= prefix without touching any field', () => {
      const sensor = new RainPointSoilMoistureSensor(subProps());
      expect(() => sensor.applyStatus({ id: 'D02', value: '1,-70,1;766,52,31351' })).toThrow(
        DeviceStatusDecodeError
      );
      expect(sensor.tempMkCurrent).toBeNull();
      expect(sensor.moistPercentCurrent).toBeNull();
      expect(sensor.rfRssi).toBeNull();
    });

    it('should reject a wrong field count', () => {
      const sensor = new RainPointSoilMoistureSensor(subProps());
      expect(() => sensor.applyStatus({ id: 'D02', value: '1,-70,1;766,52' })).toThrow(DeviceStatusDecodeError);
      expect(() => sensor.applyStatus({ id: 'D02', value: '1,-70,1;766,52,G=1,9' })).toThrow(
        DeviceStatusDecodeError
      );
    });

    it('should reject a non-integer moisture', () => {
      const sensor = new RainPointSoilMoistureSensor(subProps());
      expect(() => sensor.applyStatus({ id: 'D02', value: '1,-70,1;766,wet,G=31351' })).toThrow(
        "Expected an integer for soil moisture, got 'wet'"
      );
    });

    it('should describe itself in Celsius', () => {
      const sensor = new RainPointSoilMoistureSensor(subProps({ name: 'Soil', did: 'd-soil' }));
      sensor.applyStatus({ id: 'D02', value: '1,-70,1;766,52,G=31351' });
      expect(sensor.toString()).toBe(
        'Soil Moisture Sensor "Soil" (DID d-soil) at address 2: 24.8°C / 52% / 3135.1lx'
      );
    });
  });

  describe('RainPointRainSensor', () => {
    it('should decode rainfall in mm', () => {
      const sensor = new RainPointRainSensor(subProps({ address: 3 }));
      sensor.applyStatus({ id: 'D03', value: '1,-75,1;R=270(0/0/270)' });

      expect(sensor.rainfallMmTotal).toBe(27);
      expect(sensor.rainfallMmHour).toBe(0);
      expect(sensor.rainfallMmDaily).toBe(0);
      expect(sensor.rainfallMm7Days).toBe(27);
    });

    it('should set nulls for an unparseable stats group', () => {
      const sensor = new RainPointRainSensor(subProps({ address: 3 }));
      sensor.applyStatus({ id: 'D03', value: '1,-75,1;R=' });
      expect(sensor.rainfallMmTotal).toBeNull();
      expect(sensor.rfRssi).toBe(-75);
    });

    it('should reject a missing R= prefix', () => {
      const sensor = new RainPointRainSensor(subProps({ address: 3 }));
      expect(() => sensor.applyStatus({ id: 'D03', value: '1,-75,1;270(0/0/270)' })).toThrow(
        DeviceStatusDecodeError
      );
    });

    it('should describe itself with its rainfall', () => {
      const sensor = new RainPointRainSensor(subProps({ address: 3, name: 'Rain', did: 'd-rain' }));
      sensor.applyStatus({ id: 'D03', value: '1,-75,1;R=270(0/0/270)' });
      expect(sensor.toString()).toBe(
        'High Precision Rain Sensor "Rain" (DID d-rain) at address 3: 27mm total / 0mm 1h / 0mm 24h / 27mm 7days'
      );
    });
  });

  describe('RainPointAirSensor', () => {
    it('should decode temperature and humidity', () => {
      const sensor = new RainPointAirSensor(subProps({ address: 4 }));
      sensor.applyStatus({ id: 'D04', value: '1,-68,1;755(1020/588/1),54(91/24/1),' });

      expect(sensor.tempMkCurrent).toBe(297317);
      expect(sensor.tempMkDailyMax).toBe(312039);
      expect(sensor.tempMkDailyMin).toBe(288039);
      expect(sensor.tempTrend).toBe(255428);
      expect(sensor.humCurrent).toBe(54);
      expect(sensor.humDailyMax).toBe(91);
      expect(sensor.humDailyMin).toBe(24);
      expect(sensor.humTrend).toBe(1);
    });

    it('should reject a value with fewer than two fields', () => {
      const sensor = new RainPointAirSensor(subProps({ address: 4 }));
      expect(() => sensor.applyStatus({ id: 'D04', value: '1,-68,1;755(1020/588/1)' })).toThrow(
        DeviceStatusDecodeError
      );
    });

    it('should describe itself in Celsius', () => {
      const sensor = new RainPointAirSensor(subProps({ address: 4, name: 'Air', did: 'd-air' }));
      sensor.applyStatus({ id: 'D04', value: '1,-68,1;755(1020/588/1),54(91/24/1),' });
      expect(sensor.toString()).toBe('Outdoor Air Humidity Sensor "Air" (DID d-air) at address 4: 24.2°C / 54%');
    });
  });

  describe('generic devices', () => {
    it('should describe unknown hubs generically', () => {
      const hub = new HubDevice(
        { model: null, modelCode: 1, name: null, did: 'd-x', mid: 1, alerts: null },
        [new SubDevice(subProps())]
      );
      expect(hub.description).toBe('Unknown HomGar hub');
      expect(hub.getStatusIds()).toEqual(['D01']);
      expect(hub.toString()).toBe('Unknown HomGar hub "" (DID d-x) with 1 subdevices');
    });

    it('should include the port number in subdevice snapshots', () => {
      const timer = new RainPoint2ZoneTimer(subProps({ address: 5, portNumber: 2 }));
      expect(timer.toJSON()).toEqual({
        description: '2-Zone Water Timer',
        model: 'TEST',
        modelCode: 0,
        name: 'Sensor',
        did: 'd-1',
        mid: 2001,
        address: 5,
        rfRssi: null,
        alerts: null,
        readings: {},
        portNumber: 2,
      });
    });
  });
});
