/**
 * Configuration loader for the ECS cluster exporter.
 *
 * Reads command-line flags (falling back to environment variables),
 * validates them and turns them into a {@link Config}.
 */

import { isIP } from 'node:net';
import yargs from 'yargs';
import { z } from 'zod';
import type { Config } from '@/types';
import { isLogLevel } from '@shared/utils/logger';

export const DEFAULT_LISTEN_ADDRESS = '[::1]:6543';
export const DEFAULT_ROLE_SESSION_NAME = 'ecs-exporter';

const ROLE_ARN_PATTERN = /^arn:aws:iam::\d{12}:role\/.+$/i;

/**
 * Base exception for configuration errors.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when the configuration is missing required fields or is invalid.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parses a listen address of the form `host:port` or `[ipv6]:port`.
 *
 * The host must be an IP literal.
 *
 * @returns Host and port, or null if the address is malformed
 */
export function parseListenAddress(value: string): { host: string; port: number } | null {
  const match = /^(?:\[([^\]]+)\]|([^:[\]]+)):(\d{1,5})$/.exec(value.trim());
  if (!match) {
    return null;
  }

  const host = match[1] ?? match[2];
  const port = Number(match[3]);
  if (!host || port > 65535) {
    return null;
  }
  // Brackets are only valid around IPv6 literals
  const family = isIP(host);
  if (family === 0 || (match[1] !== undefined) !== (family === 6)) {
    return null;
  }
  return { host, port };
}

/**
 * Splits comma- or whitespace-separated values and drops empty entries.
 */
export function splitList(values: readonly string[] | string | undefined): string[] {
  if (values === undefined) {
    return [];
  }
  const list = typeof values === 'string' ? [values] : values;
  return list.flatMap((value) => value.split(/[\s,]+/)).filter((value) => value.length > 0);
}

/**
 * Configuration schema validation using Zod.
 */
const ConfigSchema = z
  .object({
    clusters: z
      .array(z.string().min(1, 'cluster names must not be empty'))
      .min(1, 'at least one cluster is required'),
    region: z.string().min(1).optional(),
    role: z
      .string()
      .regex(ROLE_ARN_PATTERN, 'must be of the form `arn:aws:iam::123456789012:role/something`')
      .optional(),
    roleExternalId: z.string().min(1).optional(),
    roleSessionName: z.string().min(1),
    listen: z.string().transform((value, ctx) => {
      const address = parseListenAddress(value);
      if (!address) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `invalid listen address '${value}', expected host:port or [ipv6]:port`,
        });
        return z.NEVER;
      }
      return address;
    }),
    tlsKey: z.string().min(1).optional(),
    tlsCert: z.string().min(1).optional(),
    logLevel: z
      .string()
      .transform((value) => value.toLowerCase())
      .refine(isLogLevel, { message: 'unknown log level' }),
  })
  .refine((config) => (config.tlsKey === undefined) === (config.tlsCert === undefined), {
    message: 'tls-key and tls-cert must be given together',
    path: ['tlsKey'],
  });

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Parses command-line arguments, using environment variables as defaults.
 *
 * @param argv - Arguments without the node executable and script path
 * @param env - Environment to read fallbacks from
 * @returns Raw option values, not yet validated
 *
 * @throws {ConfigValidationError} If the arguments cannot be parsed
 */
export function parseArguments(argv: string[], env: NodeJS.ProcessEnv): z.input<typeof ConfigSchema> {
  const args = yargs(argv)
    .scriptName('ecs-cluster-exporter')
    .usage('Usage: $0 --cluster <name> [--cluster <name> ...] [options]')
    .option('cluster', {
      type: 'string',
      array: true,
      describe: 'Cluster name (one or more) [env: ECS_EXPORTER_CLUSTERS]',
    })
    .option('region', {
      type: 'string',
      describe: 'AWS Region to use, if any [env: AWS_REGION]',
    })
    .option('role', {
      type: 'string',
      describe: 'AWS Role to assume, if any [env: ECS_EXPORTER_ROLE]',
    })
    .option('role-external-id', {
      type: 'string',
      describe: 'External id passed when assuming the role [env: ECS_EXPORTER_ROLE_EXTERNAL_ID]',
    })
    .option('role-session-name', {
      type: 'string',
      describe: 'Session name used when assuming the role [env: ECS_EXPORTER_ROLE_SESSION_NAME]',
    })
    .option('listen', {
      alias: 'l',
      type: 'string',
      describe: `HTTP listen address (default: ${DEFAULT_LISTEN_ADDRESS}) [env: ECS_EXPORTER_LISTEN]`,
    })
    .option('tls-key', {
      type: 'string',
      describe: 'Path to the TLS private key [env: ECS_EXPORTER_TLS_KEY]',
    })
    .option('tls-cert', {
      type: 'string',
      describe: 'Path to the TLS certificate [env: ECS_EXPORTER_TLS_CERT]',
    })
    .option('log-level', {
      type: 'string',
      describe: 'Log level (default: info) [env: LOG_LEVEL]',
    })
    .strict()
    .wrap(120)
    .fail((message, error) => {
      throw new ConfigValidationError(message ?? String(error), { cause: error });
    })
    .parseSync();

  const clusters = args.cluster ?? splitList(env.ECS_EXPORTER_CLUSTERS);

  return {
    clusters: splitList(clusters),
    region: emptyToUndefined(args.region ?? env.AWS_REGION),
    role: emptyToUndefined(args.role ?? env.ECS_EXPORTER_ROLE),
    roleExternalId: emptyToUndefined(args.roleExternalId ?? env.ECS_EXPORTER_ROLE_EXTERNAL_ID),
    roleSessionName:
      emptyToUndefined(args.roleSessionName ?? env.ECS_EXPORTER_ROLE_SESSION_NAME) ??
      DEFAULT_ROLE_SESSION_NAME,
    listen: emptyToUndefined(args.listen ?? env.ECS_EXPORTER_LISTEN) ?? DEFAULT_LISTEN_ADDRESS,
    tlsKey: emptyToUndefined(args.tlsKey ?? env.ECS_EXPORTER_TLS_KEY),
    tlsCert: emptyToUndefined(args.tlsCert ?? env.ECS_EXPORTER_TLS_CERT),
    logLevel: emptyToUndefined(args.logLevel ?? env.LOG_LEVEL) ?? 'info',
  };
}

/**
 * Loads and validates the exporter configuration.
 *
 * @param argv - Arguments without the node executable and script path
 * @param env - Environment to read fallbacks from
 * @returns Validated configuration
 *
 * @throws {ConfigValidationError} If arguments are malformed or values are invalid
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): Config {
  const raw = parseArguments(argv, env);

  let validated: z.output<typeof ConfigSchema>;
  try {
    validated = ConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const problems = error.errors.map((e) => `${e.path.join('.') || 'config'}: ${e.message}`);
      throw new ConfigValidationError(
        `Configuration validation failed. ${problems.join('; ')}`,
        { cause: error }
      );
    }
    throw new ConfigValidationError(`Configuration validation failed: ${String(error)}`, {
      cause: error,
    });
  }

  return {
    clusterNames: validated.clusters,
    region: validated.region,
    role: validated.role
      ? {
          arn: validated.role,
          externalId: validated.roleExternalId,
          sessionName: validated.roleSessionName,
        }
      : undefined,
    listen: validated.listen,
    tls:
      validated.tlsKey && validated.tlsCert
        ? { keyPath: validated.tlsKey, certPath: validated.tlsCert }
        : undefined,
    logLevel: validated.logLevel,
  };
}
