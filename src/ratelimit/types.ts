/**
 * Classes of endpoints that carry their own limits.
 */
export type EndpointClass = 'guess' | 'general';

/**
 * Independent identity dimensions a request is counted under.
 */
export type LimitDimension = 'ip' | 'user';

export type WindowLimit = {
  maxRequests: number;
  windowSeconds: number;
};

export type RateLimitConfig = Record<EndpointClass, Record<LimitDimension, WindowLimit>>;

/**
 * Identity a request is bucketed under. `user` is absent for anonymous requests,
 * in which case only the network dimension is checked.
 */
export type ClientKey = {
  network: string;
  user?: string;
};

export type Admitted = {
  admitted: true;
  limit: number; // network-dimension limit for the endpoint class
  remaining: number; // network-dimension requests left in the window
};

export type Denied = {
  admitted: false;
  limitType: LimitDimension;
  limit: number;
  retryAfterSeconds: number;
};

export type RateDecision = Admitted | Denied;

export type DimensionUsage = {
  current: number;
  limit: number;
  remaining: number;
  windowSeconds: number;
};

export type RateUsage = {
  ip: DimensionUsage;
  user?: DimensionUsage;
};

export const DEFAULT_RATE_LIMITS: RateLimitConfig = {
  guess: {
    ip: { maxRequests: 30, windowSeconds: 60 },
    user: { maxRequests: 10, windowSeconds: 60 },
  },
  general: {
    ip: { maxRequests: 100, windowSeconds: 60 },
    user: { maxRequests: 60, windowSeconds: 60 },
  },
};
