import type { StatusRecord } from '../types/index.js';
import { HubDevice, SubDevice, type Reading } from './device.js';
import {
  mapStats,
  parseInteger,
  parseStatsValue,
  splitFields,
  stripPrefix,
  tempToMilliKelvin,
} from './stats.js';

function formatCelsius(milliKelvin: number): string {
  return `${(milliKelvin / 1000 - 273.15).toFixed(1)}°C`;
}

export class RainPointDisplayHub extends HubDevice {
  static readonly MODEL_CODES = [264];
  static readonly DESCRIPTION: string = 'Irrigation Display Hub';

  wifiRssi: number | null = null;
  batteryState: number | null = null;
  connected: boolean | null = null;

  tempMkCurrent: number | null = null;
  tempMkDailyMax: number | null = null;
  tempMkDailyMin: number | null = null;
  tempTrend: number | null = null;
  humCurrent: number | null = null;
  humDailyMax: number | null = null;
  humDailyMin: number | null = null;
  humTrend: number | null = null;
  pressPaCurrent: number | null = null;
  pressPaDailyMax: number | null = null;
  pressPaDailyMin: number | null = null;
  pressTrend: number | null = null;

  get description(): string {
    return RainPointDisplayHub.DESCRIPTION;
  }

  getStatusIds(): string[] {
    return ['connected', 'state', ...super.getStatusIds()];
  }

  applyStatus(record: StatusRecord): void {
    if (record.id === 'state') {
      const [batteryState, wifiRssi] = splitFields(record.value, ',', 2, 'hub state');
      const battery = parseInteger(batteryState, 'battery state');
      const rssi = parseInteger(wifiRssi, 'wifi rssi');
      this.batteryState = battery;
      this.wifiRssi = rssi;
    } else if (record.id === 'connected') {
      this.connected = record.value === '1';
    } else {
      super.applyStatus(record);
    }
  }

  /**
   * Observed: `781(781/723/1),52(64/50/1),P=10213(10222/10205/1),`
   *
   * temp[.1F](day-max/day-min/trend),humidity[%](...),P=pressure[Pa](...),
   */
  protected decodeSpecificStatus(s: string): () => void {
    const [tempStr, humStr, pressStr] = splitFields(s, ',', 3, 'display hub status', true);
    const temp = mapStats(parseStatsValue(tempStr), tempToMilliKelvin);
    const hum = parseStatsValue(humStr);
    const press = parseStatsValue(stripPrefix(pressStr, 'P=', 'pressure'));

    return () => {
      [this.tempMkCurrent, this.tempMkDailyMax, this.tempMkDailyMin, this.tempTrend] = temp;
      [this.humCurrent, this.humDailyMax, this.humDailyMin, this.humTrend] = hum;
      [this.pressPaCurrent, this.pressPaDailyMax, this.pressPaDailyMin, this.pressTrend] = press;
    };
  }

  protected readings(): Record<string, Reading> {
    return {
      wifiRssi: this.wifiRssi,
      batteryState: this.batteryState,
      connected: this.connected,
      tempMkCurrent: this.tempMkCurrent,
      tempMkDailyMax: this.tempMkDailyMax,
      tempMkDailyMin: this.tempMkDailyMin,
      tempTrend: this.tempTrend,
      humCurrent: this.humCurrent,
      humDailyMax: this.humDailyMax,
      humDailyMin: this.humDailyMin,
      humTrend: this.humTrend,
      pressPaCurrent: this.pressPaCurrent,
      pressPaDailyMax: this.pressPaDailyMax,
      pressPaDailyMin: this.pressPaDailyMin,
      pressTrend: this.pressTrend,
    };
  }

  toString(): string {
    const s = super.toString();
    if (this.tempMkCurrent === null) {
      return s;
    }
    return `${s}: ${(this.tempMkCurrent / 1000).toFixed(1)}K / ${this.humCurrent ?? '?'}% / ${this.pressPaCurrent ?? '?'}Pa`;
  }
}

export class RainPointSoilMoistureSensor extends SubDevice {
  static readonly MODEL_CODES = [72];
  static readonly DESCRIPTION: string = 'Soil Moisture Sensor';

  tempMkCurrent: number | null = null;
  moistPercentCurrent: number | null = null;
  lightLuxCurrent: number | null = null;

  get description(): string {
    return RainPointSoilMoistureSensor.DESCRIPTION;
  }

  /**
   * Observed: `766,52,G=31351`
   *
   * temp[.1F],soil-moisture[%],G=light[.1lux]
   */
  protected decodeSpecificStatus(s: string): () => void {
    const [tempStr, moistStr, lightStr] = splitFields(s, ',', 3, 'soil moisture status');
    const temp = tempToMilliKelvin(parseInteger(tempStr, 'temperature'));
    const moisture = parseInteger(moistStr, 'soil moisture');
    const light = parseInteger(stripPrefix(lightStr, 'G=', 'light'), 'light') / 10;

    return () => {
      this.tempMkCurrent = temp;
      this.moistPercentCurrent = moisture;
      this.lightLuxCurrent = light;
    };
  }

  protected readings(): Record<string, Reading> {
    return {
      tempMkCurrent: this.tempMkCurrent,
      moistPercentCurrent: this.moistPercentCurrent,
      lightLuxCurrent: this.lightLuxCurrent,
    };
  }

  toString(): string {
    const s = super.toString();
    if (this.tempMkCurrent === null) {
      return s;
    }
    return `${s}: ${formatCelsius(this.tempMkCurrent)} / ${this.moistPercentCurrent ?? '?'}% / ${(this.lightLuxCurrent ?? 0).toFixed(1)}lx`;
  }
}

export class RainPointRainSensor extends SubDevice {
  static readonly MODEL_CODES = [87];
  static readonly DESCRIPTION: string = 'High Precision Rain Sensor';

  rainfallMmTotal: number | null = null;
  rainfallMmHour: number | null = null;
  rainfallMmDaily: number | null = null;
  rainfallMm7Days: number | null = null;

  get description(): string {
    return RainPointRainSensor.DESCRIPTION;
  }

  /**
   * Observed: `R=270(0/0/270)`
   *
   * R=total[.1mm](hour[.1mm]/24hours[.1mm]/7days[.1mm])
   */
  protected decodeSpecificStatus(s: string): () => void {
    const rainfall = mapStats(parseStatsValue(stripPrefix(s, 'R=', 'rainfall')), (v) => v / 10);

    return () => {
      [this.rainfallMmTotal, this.rainfallMmHour, this.rainfallMmDaily, this.rainfallMm7Days] = rainfall;
    };
  }

  protected readings(): Record<string, Reading> {
    return {
      rainfallMmTotal: this.rainfallMmTotal,
      rainfallMmHour: this.rainfallMmHour,
      rainfallMmDaily: this.rainfallMmDaily,
      rainfallMm7Days: this.rainfallMm7Days,
    };
  }

  toString(): string {
    const s = super.toString();
    if (this.rainfallMmTotal === null) {
      return s;
    }
    return `${s}: ${this.rainfallMmTotal}mm total / ${this.rainfallMmHour ?? '?'}mm 1h / ${this.rainfallMmDaily ?? '?'}mm 24h / ${this.rainfallMm7Days ?? '?'}mm 7days`;
  }
}

export class RainPointAirSensor extends SubDevice {
  static readonly MODEL_CODES = [262];
  static readonly DESCRIPTION: string = 'Outdoor Air Humidity Sensor';

  tempMkCurrent: number | null = null;
  tempMkDailyMax: number | null = null;
  tempMkDailyMin: number | null = null;
  tempTrend: number | null = null;
  humCurrent: number | null = null;
  humDailyMax: number | null = null;
  humDailyMin: number | null = null;
  humTrend: number | null = null;

  get description(): string {
    return RainPointAirSensor.DESCRIPTION;
  }

  /**
   * Observed: `755(1020/588/1),54(91/24/1),`
   *
   * temp[.1F](day-max/day-min/trend),humidity[%](day-max/day-min/trend)
   */
  protected decodeSpecificStatus(s: string): () => void {
    const [tempStr, humStr] = splitFields(s, ',', 2, 'air sensor status', true);
    const temp = mapStats(parseStatsValue(tempStr), tempToMilliKelvin);
    const hum = parseStatsValue(humStr);

    return () => {
      [this.tempMkCurrent, this.tempMkDailyMax, this.tempMkDailyMin, this.tempTrend] = temp;
      [this.humCurrent, this.humDailyMax, this.humDailyMin, this.humTrend] = hum;
    };
  }

  protected readings(): Record<string, Reading> {
    return {
      tempMkCurrent: this.tempMkCurrent,
      tempMkDailyMax: this.tempMkDailyMax,
      tempMkDailyMin: this.tempMkDailyMin,
      tempTrend: this.tempTrend,
      humCurrent: this.humCurrent,
      humDailyMax: this.humDailyMax,
      humDailyMin: this.humDailyMin,
      humTrend: this.humTrend,
    };
  }

  toString(): string {
    const s = super.toString();
    if (this.tempMkCurrent === null) {
      return s;
    }
    return `${s}: ${formatCelsius(this.tempMkCurrent)} / ${this.humCurrent ?? '?'}%`;
  }
}

export class RainPoint2ZoneTimer extends SubDevice {
  static readonly MODEL_CODES = [261];
  static readonly DESCRIPTION: string = '2-Zone Water Timer';

  get description(): string {
    return RainPoint2ZoneTimer.DESCRIPTION;
  }

  /**
   * Not decoded yet. Observed: `0,9,0,0,0,0|0,1291,0,0,0,0`
   *
   * Zones are separated by '|'. Per zone: ?,last-usage[.1l],?,?,?,?
   */
  protected decodeSpecificStatus(_s: string): () => void {
    return () => undefined;
  }
}
