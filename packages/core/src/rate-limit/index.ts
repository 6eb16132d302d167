export {
  IntervalRateLimiter,
  systemClock,
  type Clock,
  type IntervalRateLimiterOptions,
} from './interval-rate-limiter.js';
