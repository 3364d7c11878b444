// Randomness
export type RandomSource = () => number;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

// Core configuration interfaces
export interface RateLimiterConfig {
  requestsPerMinute: number;
  requestsPerHour: number;
  jitterMinMs: number;
  jitterMaxMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  cooldownMs: number;
}

export interface CooldownConfig {
  baseSeconds: number;
  capExponent: number;
}

export interface IdentityConfig {
  dynamicRatio: number;
  rotationEnabled: boolean;
  relayEnabled: boolean;
  relayEndpoints: string[];
  /** Adds a direct (unrelayed) slot after the relays in the rotation. */
  includeDirect: boolean;
  rotationPeriodMs: number;
}

// Logger types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text';

export interface LogContext {
  [key: string]: unknown;
}

export interface TimerHandle {
  end: () => number;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  startTimer(): TimerHandle;
}

export type LoggerFactory = (component: string) => Logger;

// Rate limiter types
export interface WaitOptions {
  signal?: AbortSignal;
  /** Absolute epoch milliseconds after which admission waiting gives up. */
  deadlineMs?: number;
}

export interface Permit {
  admittedAt: number;
  waitedMs: number;
  jitterMs: number;
}

export type AdmissionResult = { admitted: true; permit: Permit } | { admitted: false; waitMs: number };

export interface WindowOccupancy {
  used: number;
  limit: number;
}

export interface RateLimiterStats {
  minute: WindowOccupancy;
  hour: WindowOccupancy;
  totalAdmitted: number;
  totalWaitMs: number;
  totalJitterMs: number;
}

export interface RateLimiter {
  acquire(options?: WaitOptions): Promise<Permit>;
  tryAcquire(): AdmissionResult;
  getStats(): RateLimiterStats;
}

// Circuit breaker types
export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export type CircuitCheck = { allowed: true; probe: boolean } | { allowed: false; retryAfterMs: number };

export interface CircuitBreakerStats {
  state: CircuitState;
  consecutiveFailures: number;
  openedAt?: number;
  /** Time left before the open circuit admits a trial call; 0 when not open. */
  retryAfterMs: number;
  probeInFlight: boolean;
}

export interface CircuitBreaker {
  checkOpen(): CircuitCheck;
  reportSuccess(): void;
  reportFailure(): void;
  releaseProbe(): void;
  isOpen(): boolean;
  getStats(): CircuitBreakerStats;
}

// Retry types
export type RetryablePredicate = (error: Error) => boolean;

export interface RetryOptions extends RetryConfig {
  isRetryable?: RetryablePredicate;
  signal?: AbortSignal;
  random?: RandomSource;
  sleep?: Sleep;
  onRetry?: (info: RetryAttemptInfo) => void;
}

export interface RetryAttemptInfo {
  attempt: number;
  delayMs: number;
  error: Error;
}

// Cooldown types
export interface CooldownState {
  consecutiveOperationFailures: number;
  currentCooldownSeconds: number;
}

export interface CooldownEscalator {
  recordFailure(): CooldownState;
  recordSuccess(): CooldownState;
  getState(): CooldownState;
}

// Strategy types
export interface StrategyProfile {
  clients: string[];
  userAgent?: string;
  headers?: Record<string, string>;
  options?: Record<string, unknown>;
}

export interface StrategyDefinition {
  name: string;
  priority: number;
  profile: StrategyProfile;
}

export interface StrategyRecord {
  name: string;
  priority: number;
  profile: StrategyProfile;
  successCount: number;
  failureCount: number;
  lastOutcomeAt?: number;
}

export interface StrategyFailure {
  strategy: string;
  message: string;
  cause: Error;
}

export interface StrategyChain {
  tryAll<T>(execute: (strategy: StrategyRecord) => Promise<T>, options?: { signal?: AbortSignal }): Promise<ChainSuccess<T>>;
  getStrategy(name: string): StrategyRecord | undefined;
  getRecords(): StrategyRecord[];
}

export interface ChainSuccess<T> {
  value: T;
  strategy: string;
}

// Identity types
export type Route = { kind: 'direct' } | { kind: 'relayed'; relayId: string; endpoint: string };

export type FingerprintSource = 'dynamic' | 'static';

export interface Identity {
  readonly id: number;
  readonly fingerprint: string;
  readonly route: Route;
  readonly source: FingerprintSource;
  readonly issuedAt: number;
}

export interface IdentityStats {
  issued: number;
  dynamicIssued: number;
  staticIssued: number;
  staticPoolSize: number;
  relayEnabled: boolean;
  relayPoolSize: number;
  currentRelay?: string;
}

export interface IdentityProvider {
  next(): Identity;
  getStats(): IdentityStats;
}

// Resilient client types
export type Transport<TRequest, TResponse> = (
  request: TRequest,
  identity: Identity,
  profile: StrategyProfile,
  signal: AbortSignal
) => Promise<TResponse>;

export type CooldownMode = 'block' | 'hint';

export interface ResilientClientConfig {
  rateLimiter: RateLimiterConfig;
  retry: RetryConfig;
  circuitBreaker: CircuitBreakerConfig;
  cooldown: CooldownConfig;
  identity: IdentityConfig;
  strategies: StrategyDefinition[];
  enableMultiStrategy: boolean;
  attemptTimeoutMs: number;
  cooldownMode: CooldownMode;
}

export interface ResilientClientOptions<TRequest, TResponse> {
  transport: Transport<TRequest, TResponse>;
  config?: Partial<ResilientClientConfig>;
  isRetryable?: RetryablePredicate;
  random?: RandomSource;
  sleep?: Sleep;
  createLogger?: LoggerFactory;
  identityProvider?: IdentityProvider;
}

export type FetchOptions = WaitOptions;

export interface ClientTotals {
  fetches: number;
  successes: number;
  failures: number;
  circuitRejections: number;
}

export interface ResilientClientStats {
  circuitState: CircuitState;
  consecutiveFailures: number;
  strategyRecords: StrategyRecord[];
  currentCooldownSeconds: number;
  consecutiveOperationFailures: number;
  rateWindowOccupancy: { minute: WindowOccupancy; hour: WindowOccupancy };
  totals: ClientTotals;
  identity: IdentityStats;
}

export interface ResilientClient<TRequest, TResponse> {
  fetch(request: TRequest, options?: FetchOptions): Promise<TResponse>;
  getStats(): ResilientClientStats;
}
