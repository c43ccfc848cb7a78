export {
  GestureTrigger,
  INITIAL_TRIGGER_STATE,
  noteDuration,
  noteVelocity,
  resolveTriggerSettings,
  stepTrigger,
  type TriggerInput,
  type TriggerSettings,
  type TriggerState,
  type TriggerStep,
} from "./GestureTrigger";
