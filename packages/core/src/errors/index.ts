export {
  OpenDotaApiError,
  OpenDotaNotFoundError,
  OpenDotaRateLimitError,
  OpenDotaTransportError,
  OpenDotaConfigError,
  toError,
} from './opendota-error.js';
