export { SECONDS_PER_HOUR, now, formatLocalDate, previousLocalDate, localDayWindow, isIsoDate, isValidTimeZone } from './helpers';
