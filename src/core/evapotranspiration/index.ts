export { computeEt0, computeZoneEt, toEtInputs, netRadiation, penmanMonteith, priestleyTaylor, hargreaves } from './evapotranspiration';
export type { EtInputs, EtResult } from './types';
