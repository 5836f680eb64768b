export { aggregateDailyWeather, formatDailyWeather } from './daily-weather';
export type { DailyWeatherAggregate } from './types';
