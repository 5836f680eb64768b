export { ET_METHOD_LABELS, methodFor, selectEtMethod } from './et-method';
export type { MethodSelection, RequiredField, InputAvailability } from './types';
