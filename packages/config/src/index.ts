export { envSchema, parseEnv } from "./env.js";
export {
  RULE_NAMES,
  getProfileDefaults,
  isRuleEnabled,
  getEffectiveRules,
} from "./guardrail-profiles.js";
export type { ProfileDefaults } from "./guardrail-profiles.js";
