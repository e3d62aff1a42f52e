export {
  ResolutionPolicy,
  type EventSink,
  type ResolutionComponents,
  type ResolutionPolicySettings,
  type ResolutionTrace,
} from './resolution-policy.js';
