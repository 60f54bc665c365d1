/**
 * Environment Variable Schema & Validation
 *
 * Central registry of the environment variables the bridge reads.
 * Provides validation, documentation, and a CLI summary.
 */

export interface EnvVarDef {
  /** Environment variable name */
  name: string;
  /** Expected value type */
  type: 'string' | 'number';
  /** Default value (as string, since env vars are always strings) */
  default?: string;
  /** Human-readable description */
  description: string;
  /** Category for grouping in CLI output */
  category: EnvCategory;
  /** Minimum value for numbers */
  min?: number;
  /** Maximum value for numbers */
  max?: number;
  /** Regex pattern for string validation */
  pattern?: RegExp;
}

export type EnvCategory = 'core' | 'handshake' | 'relay' | 'logging';

/**
 * Complete schema of all environment variables used across the codebase.
 */
export const ENV_SCHEMA: EnvVarDef[] = [
  // ---- Core ----
  {
    name: 'BRIDGE_PLUGIN_ID',
    type: 'string',
    description: 'Id the plugin registers under (--plugin-id overrides)',
    category: 'core',
    pattern: /^\S+$/,
  },
  {
    name: 'BRIDGE_BASE_URL',
    type: 'string',
    default: 'ipc:///tmp',
    description: 'Base the persistent channel address is derived from',
    category: 'core',
    pattern: /^(ipc|ws|wss|ws\+unix):\/\//,
  },

  // ---- Handshake ----
  {
    name: 'BRIDGE_RENDEZVOUS_URL',
    type: 'string',
    default: 'ipc:///tmp/gateway.addonManager',
    description: 'Address of the gateway add-on manager',
    category: 'handshake',
    pattern: /^(ipc|ws|wss|ws\+unix):\/\//,
  },
  {
    name: 'BRIDGE_HANDSHAKE_TIMEOUT_MS',
    type: 'number',
    default: '5000',
    description: 'Timeout of a single registration attempt',
    category: 'handshake',
    min: 1,
    max: 600000,
  },
  {
    name: 'BRIDGE_HANDSHAKE_RETRIES',
    type: 'number',
    default: '3',
    description: 'Registration retries after a transport failure',
    category: 'handshake',
    min: 0,
    max: 100,
  },
  {
    name: 'BRIDGE_HANDSHAKE_RETRY_DELAY_MS',
    type: 'number',
    default: '500',
    description: 'Initial backoff between registration attempts',
    category: 'handshake',
    min: 0,
    max: 60000,
  },

  // ---- Relay ----
  {
    name: 'BRIDGE_POLL_INTERVAL_MS',
    type: 'number',
    default: '33',
    description: 'Longest idle wait of the relay loop and the dispatcher',
    category: 'relay',
    min: 1,
    max: 10000,
  },
  {
    name: 'BRIDGE_QUEUE_CAPACITY',
    type: 'number',
    default: '1000',
    description: 'Messages held per direction (0 = unbounded)',
    category: 'relay',
    min: 0,
  },
  {
    name: 'BRIDGE_QUEUE_OVERFLOW',
    type: 'string',
    default: 'reject',
    description: 'What a full queue does with a new message (reject, drop-oldest)',
    category: 'relay',
    pattern: /^(reject|drop-oldest)$/,
  },

  // ---- Logging ----
  {
    name: 'LOG_LEVEL',
    type: 'string',
    default: 'info',
    description: 'Log level (debug, info, warn, error, silent)',
    category: 'logging',
    pattern: /^(debug|info|warn|error|silent)$/i,
  },
  {
    name: 'LOG_FORMAT',
    type: 'string',
    default: 'text',
    description: 'Log line format (text, json)',
    category: 'logging',
    pattern: /^(text|json)$/i,
  },
];

// ---------------------------------------------------------------------------
// Lookup helpers
// ---------------------------------------------------------------------------

const schemaByName: Map<string, EnvVarDef> = new Map(
  ENV_SCHEMA.map(def => [def.name, def])
);

/**
 * Look up a single env var definition by name.
 */
export function getEnvDef(name: string): EnvVarDef | undefined {
  return schemaByName.get(name);
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Check a single raw value against its definition. Returns a warning, or
 * undefined when the value is acceptable.
 */
export function checkEnvValue(def: EnvVarDef, raw: string): string | undefined {
  switch (def.type) {
    case 'number': {
      const num = Number(raw);
      if (isNaN(num)) {
        return `${def.name} should be a number but got "${raw}"`;
      }
      if (def.min !== undefined && num < def.min) {
        return `${def.name}=${raw} is below minimum ${def.min}`;
      }
      if (def.max !== undefined && num > def.max) {
        return `${def.name}=${raw} is above maximum ${def.max}`;
      }
      return undefined;
    }
    case 'string': {
      if (def.pattern && !def.pattern.test(raw)) {
        return `${def.name}="${raw}" does not match expected pattern ${def.pattern}`;
      }
      return undefined;
    }
  }
}

function isSet(raw: string | undefined): raw is string {
  return raw !== undefined && raw !== '';
}

/**
 * Warnings for every set variable whose value the schema rejects. Unset
 * variables fall back to their defaults and are not reported.
 */
export function validateEnv(env: Record<string, string | undefined> = process.env): string[] {
  const warnings: string[] = [];
  for (const def of ENV_SCHEMA) {
    const raw = env[def.name];
    if (!isSet(raw)) continue;
    const warning = checkEnvValue(def, raw);
    if (warning) {
      warnings.push(warning);
    }
  }
  return warnings;
}

// ---------------------------------------------------------------------------
// Summary / CLI output
// ---------------------------------------------------------------------------

const CATEGORY_ORDER: EnvCategory[] = ['core', 'handshake', 'relay', 'logging'];

const CATEGORY_LABELS: Record<EnvCategory, string> = {
  core: 'Core',
  handshake: 'Handshake',
  relay: 'Relay & Queues',
  logging: 'Logging',
};

/**
 * Printed by `plugin-bridge --print-env`: one block per category, each
 * variable with its effective value and where that value comes from.
 */
export function getEnvSummary(env: Record<string, string | undefined> = process.env): string {
  const lines = ['Plugin Bridge Environment Configuration'];
  let setCount = 0;

  for (const category of CATEGORY_ORDER) {
    const defs = ENV_SCHEMA.filter(def => def.category === category);
    if (defs.length === 0) continue;

    lines.push('', `[${CATEGORY_LABELS[category]}]`);
    for (const def of defs) {
      const raw = env[def.name];
      if (isSet(raw)) {
        setCount++;
        lines.push(`  ${def.name}=${raw} (env)`);
      } else if (def.default !== undefined) {
        lines.push(`  ${def.name}=${def.default} (default)`);
      } else {
        lines.push(`  ${def.name} (unset)`);
      }
      lines.push(`      ${def.description}`);
    }
  }

  const warnings = validateEnv(env);
  if (warnings.length > 0) {
    lines.push('', 'Warnings (defaults used instead):');
    lines.push(...warnings.map(warning => `  ${warning}`));
  }

  lines.push('', `${setCount} of ${ENV_SCHEMA.length} variables set in the environment`);
  return lines.join('\n');
}
