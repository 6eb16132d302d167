export {
  FANTASY,
  fantasyPoints,
  isFantasyKey,
  resolveFantasy,
  type FantasyKey,
  type FantasyStats,
  type FantasyWeights,
} from './fantasy.js';
export {
  API_KEY_ENV,
  MAX_TIMER_SECONDS,
  OPENDOTA_API_URL,
  OpenDotaSettingsSchema,
  resolveConfig,
  type OpenDotaConfig,
  type OpenDotaOptions,
  type OpenDotaSettings,
  type ResponseFormat,
} from './options.js';
