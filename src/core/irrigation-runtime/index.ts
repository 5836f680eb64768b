export {
  calculateEffectiveDeficit,
  calculateRuntimeSeconds,
  calculateZoneRuntime,
  clampRuntime,
  evaluateCanRun
} from './irrigation-runtime';
export type { CanRunDecision, RuntimeLimits, RuntimePlan, RuntimePlanInput } from './types';
