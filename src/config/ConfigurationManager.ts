/**
 * Configuration Manager for engine settings: defaults, an optional JSON file
 * and HEDGER_* environment overrides, validated before the engine starts
 */

import { promises as fs } from 'fs';
import { VenueCredentials } from '../connectors/VenueConnector';
import { createPricingAlgorithm } from '../services/PricingAlgorithm';
import { RiskLimits } from '../services/RiskGuard';
import { ConfigurationError, errorMessage } from '../utils/ErrorHandler';
import { LogLevel, isLogLevel } from '../utils/consoleSink';

export type Environment = 'development' | 'staging' | 'production';
export type VenueMode = 'paper' | 'live';

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production'];

export interface TradingSection {
  /** Base asset, e.g. BRETT */
  instrument: string;
  /** Primary venue symbol; defaults to `${instrument}-USD` */
  primarySymbol?: string;
  /** Secondary venue symbol; defaults to the instrument */
  secondarySymbol?: string;
  tradeSize: number;
  pricingStrategy: string;
  repriceThreshold: number;
  cycleIntervalMs: number;
  errorBackoffMs: number;
  cancelOnHalt: boolean;
}

export interface HedgeSection {
  maxRetries: number;
  baseBackoffMs: number;
  backoffMultiplier: number;
  maxBackoffMs: number;
}

export interface VenueEndpoint {
  /** Order gateway for signed writes */
  gatewayUrl: string;
  /** Public market data endpoint; connector default when unset */
  publicUrl?: string;
  requestTimeoutMs: number;
  credentials?: VenueCredentials;
}

export interface VenuesSection {
  mode: VenueMode;
  primary: VenueEndpoint;
  secondary: VenueEndpoint;
}

export interface ControlSection {
  enabled: boolean;
  host: string;
  port: number;
}

export interface AuditSection {
  signingKey?: string;
  maxEvents: number;
}

export interface EngineConfig {
  environment: Environment;
  logLevel: LogLevel;
  trading: TradingSection;
  hedge: HedgeSection;
  risk: RiskLimits;
  venues: VenuesSection;
  control: ControlSection;
  audit: AuditSection;
}

export interface ConfigValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigValidationError[];
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function primarySymbol(config: EngineConfig): string {
  return config.trading.primarySymbol ?? `${config.trading.instrument}-USD`;
}

export function secondarySymbol(config: EngineConfig): string {
  return config.trading.secondarySymbol ?? config.trading.instrument;
}

export function getDefaultConfiguration(): EngineConfig {
  return {
    environment: 'development',
    logLevel: 'info',
    trading: {
      instrument: 'BRETT',
      tradeSize: 1.0,
      pricingStrategy: 'BestBidAsk',
      repriceThreshold: 0.001,
      cycleIntervalMs: 1000,
      errorBackoffMs: 5000,
      cancelOnHalt: true
    },
    hedge: {
      maxRetries: 3,
      baseBackoffMs: 500,
      backoffMultiplier: 2,
      maxBackoffMs: 5000
    },
    risk: {
      maxPositionSize: 10.0,
      maxDailyTrades: 100,
      stopLossPercentage: 0.05
    },
    venues: {
      mode: 'paper',
      primary: { gatewayUrl: 'http://localhost:8081', requestTimeoutMs: 5000 },
      secondary: { gatewayUrl: 'http://localhost:8082', requestTimeoutMs: 5000 }
    },
    control: {
      enabled: true,
      host: '127.0.0.1',
      port: 8080
    },
    audit: {
      maxEvents: 10000
    }
  };
}

/**
 * Reads typed fields out of untrusted JSON, collecting type errors instead of throwing
 */
class FieldReader {
  readonly errors: ConfigValidationError[] = [];

  section(source: JsonObject, key: string, path: string): JsonObject {
    const value = source[key];
    if (value === undefined) return {};
    if (isJsonObject(value)) return value;
    this.errors.push({ path, message: `${path} must be an object`, value });
    return {};
  }

  number(source: JsonObject, key: string, path: string): number | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value === 'number') return value;
    this.errors.push({ path, message: `${path} must be a number`, value });
    return undefined;
  }

  string(source: JsonObject, key: string, path: string): string | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value === 'string') return value;
    this.errors.push({ path, message: `${path} must be a string`, value });
    return undefined;
  }

  boolean(source: JsonObject, key: string, path: string): boolean | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value === 'boolean') return value;
    this.errors.push({ path, message: `${path} must be a boolean`, value });
    return undefined;
  }
}

export class ConfigurationManager {
  private config: EngineConfig;
  private readonly configFilePath: string;
  private readonly env: NodeJS.ProcessEnv;
  private parseErrors: ConfigValidationError[] = [];

  constructor(configFilePath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
    this.configFilePath = configFilePath ?? env.HEDGER_CONFIG_FILE ?? './config/engine.json';
    this.config = getDefaultConfiguration();
  }

  /**
   * Loads configuration from file and environment variables.
   * Throws ConfigurationError listing every problem when the result is invalid.
   */
  async loadConfiguration(): Promise<EngineConfig> {
    this.parseErrors = [];
    let merged = getDefaultConfiguration();

    const fileConfig = await this.loadConfigurationFromFile();
    if (fileConfig) {
      merged = this.applyOverrides(merged, fileConfig);
    }
    merged = this.applyOverrides(merged, this.loadConfigurationFromEnvironment());

    const validation = this.validateConfiguration(merged);
    const errors = [...this.parseErrors, ...validation.errors];
    if (errors.length > 0) {
      throw new ConfigurationError(`Configuration validation failed: ${errors.map(e => e.message).join(', ')}`);
    }

    this.config = merged;
    return this.getConfiguration();
  }

  getConfiguration(): EngineConfig {
    return structuredClone(this.config);
  }

  getConfigSection<T extends keyof EngineConfig>(section: T): EngineConfig[T] {
    return structuredClone(this.config[section]);
  }

  getConfigFilePath(): string {
    return this.configFilePath;
  }

  /**
   * Validates the entire configuration
   */
  validateConfiguration(config: EngineConfig): ConfigValidationResult {
    const errors: ConfigValidationError[] = [];

    if (!ENVIRONMENTS.includes(config.environment)) {
      errors.push({ path: 'environment', message: 'Environment must be development, staging, or production', value: config.environment });
    }

    if (!isLogLevel(config.logLevel)) {
      errors.push({ path: 'logLevel', message: 'Log level must be debug, info, warn, or error', value: config.logLevel });
    }

    errors.push(...this.validateTradingConfig(config.trading, config.risk));
    errors.push(...this.validateHedgeConfig(config.hedge));
    errors.push(...this.validateRiskConfig(config.risk));
    errors.push(...this.validateVenuesConfig(config.venues));
    errors.push(...this.validateControlConfig(config.control));

    if (!Number.isInteger(config.audit.maxEvents) || config.audit.maxEvents < 1) {
      errors.push({ path: 'audit.maxEvents', message: 'Audit retention must be a positive integer', value: config.audit.maxEvents });
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  private validateTradingConfig(trading: TradingSection, risk: RiskLimits): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (trading.instrument.trim().length === 0) {
      errors.push({ path: 'trading.instrument', message: 'Instrument is required', value: trading.instrument });
    }

    if (!Number.isFinite(trading.tradeSize) || trading.tradeSize <= 0) {
      errors.push({ path: 'trading.tradeSize', message: 'Trade size must be positive', value: trading.tradeSize });
    } else if (Number.isFinite(risk.maxPositionSize) && trading.tradeSize > risk.maxPositionSize) {
      errors.push({ path: 'trading.tradeSize', message: 'Trade size must not exceed the max position size', value: trading.tradeSize });
    }

    try {
      createPricingAlgorithm(trading.pricingStrategy);
    } catch (error) {
      errors.push({ path: 'trading.pricingStrategy', message: errorMessage(error), value: trading.pricingStrategy });
    }

    if (!Number.isFinite(trading.repriceThreshold) || trading.repriceThreshold < 0 || trading.repriceThreshold >= 1) {
      errors.push({ path: 'trading.repriceThreshold', message: 'Reprice threshold must be in [0, 1)', value: trading.repriceThreshold });
    }

    if (!Number.isFinite(trading.cycleIntervalMs) || trading.cycleIntervalMs <= 0) {
      errors.push({ path: 'trading.cycleIntervalMs', message: 'Cycle interval must be positive', value: trading.cycleIntervalMs });
    }

    if (!Number.isFinite(trading.errorBackoffMs) || trading.errorBackoffMs < 0) {
      errors.push({ path: 'trading.errorBackoffMs', message: 'Error backoff must be non-negative', value: trading.errorBackoffMs });
    }

    return errors;
  }

  private validateHedgeConfig(hedge: HedgeSection): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (!Number.isInteger(hedge.maxRetries) || hedge.maxRetries < 0) {
      errors.push({ path: 'hedge.maxRetries', message: 'Hedge retries must be a non-negative integer', value: hedge.maxRetries });
    }

    if (!Number.isFinite(hedge.baseBackoffMs) || hedge.baseBackoffMs < 0) {
      errors.push({ path: 'hedge.baseBackoffMs', message: 'Hedge base backoff must be non-negative', value: hedge.baseBackoffMs });
    }

    if (!Number.isFinite(hedge.backoffMultiplier) || hedge.backoffMultiplier < 1) {
      errors.push({ path: 'hedge.backoffMultiplier', message: 'Hedge backoff multiplier must be at least 1', value: hedge.backoffMultiplier });
    }

    if (!Number.isFinite(hedge.maxBackoffMs) || hedge.maxBackoffMs < hedge.baseBackoffMs) {
      errors.push({ path: 'hedge.maxBackoffMs', message: 'Hedge backoff cap must be at least the base backoff', value: hedge.maxBackoffMs });
    }

    return errors;
  }

  private validateRiskConfig(risk: RiskLimits): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (!Number.isFinite(risk.maxPositionSize) || risk.maxPositionSize <= 0) {
      errors.push({ path: 'risk.maxPositionSize', message: 'Max position size must be positive', value: risk.maxPositionSize });
    }

    if (!Number.isInteger(risk.maxDailyTrades) || risk.maxDailyTrades < 1) {
      errors.push({ path: 'risk.maxDailyTrades', message: 'Max daily trades must be a positive integer', value: risk.maxDailyTrades });
    }

    if (!Number.isFinite(risk.stopLossPercentage) || risk.stopLossPercentage <= 0 || risk.stopLossPercentage > 1) {
      errors.push({ path: 'risk.stopLossPercentage', message: 'Stop-loss percentage must be in (0, 1]', value: risk.stopLossPercentage });
    }

    return errors;
  }

  private validateVenuesConfig(venues: VenuesSection): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (venues.mode !== 'paper' && venues.mode !== 'live') {
      errors.push({ path: 'venues.mode', message: 'Venue mode must be paper or live', value: venues.mode });
    }

    const endpoints: Array<['primary' | 'secondary', VenueEndpoint]> = [
      ['primary', venues.primary],
      ['secondary', venues.secondary]
    ];
    for (const [role, endpoint] of endpoints) {
      if (!Number.isFinite(endpoint.requestTimeoutMs) || endpoint.requestTimeoutMs <= 0) {
        errors.push({ path: `venues.${role}.requestTimeoutMs`, message: `Request timeout for the ${role} venue must be positive`, value: endpoint.requestTimeoutMs });
      }

      if (venues.mode !== 'live') continue;

      if (!/^https?:\/\//.test(endpoint.gatewayUrl)) {
        errors.push({ path: `venues.${role}.gatewayUrl`, message: `Gateway URL for the ${role} venue must be http(s)`, value: endpoint.gatewayUrl });
      }
      if (!endpoint.credentials?.apiKey || !endpoint.credentials.secret) {
        // value omitted: never echo credentials
        errors.push({ path: `venues.${role}.credentials`, message: `Live mode requires credentials for the ${role} venue` });
      }
    }

    return errors;
  }

  private validateControlConfig(control: ControlSection): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (control.host.trim().length === 0) {
      errors.push({ path: 'control.host', message: 'Control server host is required', value: control.host });
    }

    if (!Number.isInteger(control.port) || control.port < 0 || control.port > 65535) {
      errors.push({ path: 'control.port', message: 'Control server port must be between 0 and 65535', value: control.port });
    }

    return errors;
  }

  /**
   * Reads the JSON file when present. A missing file means defaults.
   */
  private async loadConfigurationFromFile(): Promise<JsonObject | undefined> {
    let text: string;
    try {
      text = await fs.readFile(this.configFilePath, 'utf8');
    } catch (error) {
      if (isJsonObject(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw new ConfigurationError(`Failed to read configuration file ${this.configFilePath}: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new ConfigurationError(`Configuration file ${this.configFilePath} is not valid JSON: ${errorMessage(error)}`);
    }

    if (!isJsonObject(parsed)) {
      throw new ConfigurationError(`Configuration file ${this.configFilePath} must contain a JSON object`);
    }
    return parsed;
  }

  /**
   * Maps HEDGER_* variables, NODE_ENV and LOG_LEVEL into the same shape as the file
   */
  private loadConfigurationFromEnvironment(): JsonObject {
    const env = this.env;
    const num = (name: string): number | undefined => {
      const raw = env[name];
      if (raw === undefined || raw === '') return undefined;
      const value = Number(raw);
      if (!Number.isFinite(value)) {
        this.parseErrors.push({ path: name, message: `${name} must be a number`, value: raw });
        return undefined;
      }
      return value;
    };
    const bool = (name: string): boolean | undefined => {
      const raw = env[name];
      if (raw === undefined || raw === '') return undefined;
      if (/^(true|1|yes)$/i.test(raw)) return true;
      if (/^(false|0|no)$/i.test(raw)) return false;
      this.parseErrors.push({ path: name, message: `${name} must be true or false`, value: raw });
      return undefined;
    };
    const credentials = (prefix: string): JsonObject | undefined => {
      const apiKey = env[`${prefix}_API_KEY`];
      const secret = env[`${prefix}_API_SECRET`];
      const passphrase = env[`${prefix}_PASSPHRASE`];
      if (!apiKey && !secret && !passphrase) return undefined;
      return { apiKey, secret, passphrase };
    };

    return {
      // other NODE_ENV values (such as test) leave the environment alone
      environment: ENVIRONMENTS.find(environment => environment === env.NODE_ENV),
      logLevel: env.LOG_LEVEL?.toLowerCase(),
      trading: {
        instrument: env.HEDGER_INSTRUMENT,
        primarySymbol: env.HEDGER_PRIMARY_SYMBOL,
        secondarySymbol: env.HEDGER_SECONDARY_SYMBOL,
        tradeSize: num('HEDGER_TRADE_SIZE'),
        pricingStrategy: env.HEDGER_PRICING_STRATEGY,
        repriceThreshold: num('HEDGER_REPRICE_THRESHOLD'),
        cycleIntervalMs: num('HEDGER_CYCLE_INTERVAL_MS'),
        errorBackoffMs: num('HEDGER_ERROR_BACKOFF_MS'),
        cancelOnHalt: bool('HEDGER_CANCEL_ON_HALT')
      },
      hedge: {
        maxRetries: num('HEDGER_HEDGE_MAX_RETRIES'),
        baseBackoffMs: num('HEDGER_HEDGE_BASE_BACKOFF_MS'),
        backoffMultiplier: num('HEDGER_HEDGE_BACKOFF_MULTIPLIER'),
        maxBackoffMs: num('HEDGER_HEDGE_MAX_BACKOFF_MS')
      },
      risk: {
        maxPositionSize: num('HEDGER_MAX_POSITION_SIZE'),
        maxDailyTrades: num('HEDGER_MAX_DAILY_TRADES'),
        stopLossPercentage: num('HEDGER_STOP_LOSS_PERCENTAGE')
      },
      venues: {
        mode: env.HEDGER_VENUE_MODE,
        primary: {
          gatewayUrl: env.HEDGER_DYDX_GATEWAY_URL,
          publicUrl: env.HEDGER_DYDX_INDEXER_URL,
          credentials: credentials('HEDGER_DYDX')
        },
        secondary: {
          gatewayUrl: env.HEDGER_HYPERLIQUID_GATEWAY_URL,
          publicUrl: env.HEDGER_HYPERLIQUID_INFO_URL,
          credentials: credentials('HEDGER_HYPERLIQUID')
        }
      },
      control: {
        enabled: bool('HEDGER_CONTROL_ENABLED'),
        host: env.HEDGER_CONTROL_HOST,
        port: num('HEDGER_CONTROL_PORT')
      },
      audit: {
        signingKey: env.HEDGER_AUDIT_SIGNING_KEY,
        maxEvents: num('HEDGER_AUDIT_MAX_EVENTS')
      }
    };
  }

  /**
   * Merges an untrusted override object onto a configuration, section by section
   */
  private applyOverrides(base: EngineConfig, source: JsonObject): EngineConfig {
    const reader = new FieldReader();

    const environment = reader.string(source, 'environment', 'environment');
    const logLevel = reader.string(source, 'logLevel', 'logLevel');

    const trading = reader.section(source, 'trading', 'trading');
    const hedge = reader.section(source, 'hedge', 'hedge');
    const risk = reader.section(source, 'risk', 'risk');
    const venues = reader.section(source, 'venues', 'venues');
    const primary = reader.section(venues, 'primary', 'venues.primary');
    const secondary = reader.section(venues, 'secondary', 'venues.secondary');
    const control = reader.section(source, 'control', 'control');
    const audit = reader.section(source, 'audit', 'audit');

    const merged: EngineConfig = {
      environment: base.environment,
      logLevel: base.logLevel,
      trading: {
        instrument: reader.string(trading, 'instrument', 'trading.instrument') ?? base.trading.instrument,
        primarySymbol: reader.string(trading, 'primarySymbol', 'trading.primarySymbol') ?? base.trading.primarySymbol,
        secondarySymbol: reader.string(trading, 'secondarySymbol', 'trading.secondarySymbol') ?? base.trading.secondarySymbol,
        tradeSize: reader.number(trading, 'tradeSize', 'trading.tradeSize') ?? base.trading.tradeSize,
        pricingStrategy: reader.string(trading, 'pricingStrategy', 'trading.pricingStrategy') ?? base.trading.pricingStrategy,
        repriceThreshold: reader.number(trading, 'repriceThreshold', 'trading.repriceThreshold') ?? base.trading.repriceThreshold,
        cycleIntervalMs: reader.number(trading, 'cycleIntervalMs', 'trading.cycleIntervalMs') ?? base.trading.cycleIntervalMs,
        errorBackoffMs: reader.number(trading, 'errorBackoffMs', 'trading.errorBackoffMs') ?? base.trading.errorBackoffMs,
        cancelOnHalt: reader.boolean(trading, 'cancelOnHalt', 'trading.cancelOnHalt') ?? base.trading.cancelOnHalt
      },
      hedge: {
        maxRetries: reader.number(hedge, 'maxRetries', 'hedge.maxRetries') ?? base.hedge.maxRetries,
        baseBackoffMs: reader.number(hedge, 'baseBackoffMs', 'hedge.baseBackoffMs') ?? base.hedge.baseBackoffMs,
        backoffMultiplier: reader.number(hedge, 'backoffMultiplier', 'hedge.backoffMultiplier') ?? base.hedge.backoffMultiplier,
        maxBackoffMs: reader.number(hedge, 'maxBackoffMs', 'hedge.maxBackoffMs') ?? base.hedge.maxBackoffMs
      },
      risk: {
        maxPositionSize: reader.number(risk, 'maxPositionSize', 'risk.maxPositionSize') ?? base.risk.maxPositionSize,
        maxDailyTrades: reader.number(risk, 'maxDailyTrades', 'risk.maxDailyTrades') ?? base.risk.maxDailyTrades,
        stopLossPercentage: reader.number(risk, 'stopLossPercentage', 'risk.stopLossPercentage') ?? base.risk.stopLossPercentage
      },
      venues: {
        mode: base.venues.mode,
        primary: this.mergeEndpoint(base.venues.primary, primary, 'venues.primary', reader),
        secondary: this.mergeEndpoint(base.venues.secondary, secondary, 'venues.secondary', reader)
      },
      control: {
        enabled: reader.boolean(control, 'enabled', 'control.enabled') ?? base.control.enabled,
        host: reader.string(control, 'host', 'control.host') ?? base.control.host,
        port: reader.number(control, 'port', 'control.port') ?? base.control.port
      },
      audit: {
        signingKey: reader.string(audit, 'signingKey', 'audit.signingKey') ?? base.audit.signingKey,
        maxEvents: reader.number(audit, 'maxEvents', 'audit.maxEvents') ?? base.audit.maxEvents
      }
    };

    if (environment !== undefined) {
      const match = ENVIRONMENTS.find(candidate => candidate === environment);
      if (match) {
        merged.environment = match;
      } else {
        reader.errors.push({ path: 'environment', message: 'Environment must be development, staging, or production', value: environment });
      }
    }

    if (logLevel !== undefined) {
      if (isLogLevel(logLevel)) {
        merged.logLevel = logLevel;
      } else {
        reader.errors.push({ path: 'logLevel', message: 'Log level must be debug, info, warn, or error', value: logLevel });
      }
    }

    const mode = reader.string(venues, 'mode', 'venues.mode');
    if (mode !== undefined) {
      if (mode === 'paper' || mode === 'live') {
        merged.venues.mode = mode;
      } else {
        reader.errors.push({ path: 'venues.mode', message: 'Venue mode must be paper or live', value: mode });
      }
    }

    this.parseErrors.push(...reader.errors);
    return merged;
  }

  private mergeEndpoint(base: VenueEndpoint, source: JsonObject, path: string, reader: FieldReader): VenueEndpoint {
    const merged: VenueEndpoint = {
      gatewayUrl: reader.string(source, 'gatewayUrl', `${path}.gatewayUrl`) ?? base.gatewayUrl,
      publicUrl: reader.string(source, 'publicUrl', `${path}.publicUrl`) ?? base.publicUrl,
      requestTimeoutMs: reader.number(source, 'requestTimeoutMs', `${path}.requestTimeoutMs`) ?? base.requestTimeoutMs,
      credentials: base.credentials
    };

    const credentials = reader.section(source, 'credentials', `${path}.credentials`);
    const apiKey = reader.string(credentials, 'apiKey', `${path}.credentials.apiKey`);
    const secret = reader.string(credentials, 'secret', `${path}.credentials.secret`);
    const passphrase = reader.string(credentials, 'passphrase', `${path}.credentials.passphrase`);
    if (apiKey !== undefined || secret !== undefined || passphrase !== undefined) {
      merged.credentials = {
        apiKey: apiKey ?? base.credentials?.apiKey ?? '',
        secret: secret ?? base.credentials?.secret ?? '',
        passphrase: passphrase ?? base.credentials?.passphrase
      };
    }

    return merged;
  }
}
