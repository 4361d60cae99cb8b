export type WeatherCondition = 'sunny' | 'cloudy' | 'rainy' | 'snowy';

export interface WeatherReport {
  location: string;
  /** Degrees Celsius. */
  temperature: number;
  condition: WeatherCondition;
  /** Relative humidity, percent. */
  humidity: number;
}

export interface WeatherProvider {
  readonly name: string;
  lookup(location: string, signal?: AbortSignal): Promise<WeatherReport>;
}
