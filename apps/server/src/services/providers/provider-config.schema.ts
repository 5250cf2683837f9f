import { z } from 'zod';
import { ValidationError } from '@server/core/errors';
import type { ProviderConfig, ProviderInput, TransportKind } from '@server/core/interfaces';
import { hasPlaceholders } from './env-resolver';

export const PROVIDER_ID_PATTERN = /^[a-z0-9][a-z0-9_-]{0,63}$/;

export const DEFAULT_PROVIDER_TIMEOUT_MS = 30000;

export const TransportKindSchema = z.enum(['stdio', 'streamable_http', 'sse']);

const StringMapSchema = z.record(z.string());

export const ProviderIdSchema = z
  .string()
  .regex(PROVIDER_ID_PATTERN, 'Lowercase letters, digits, "-" and "_" only (max 64)');

/**
 * Body of an add request; also the shape every stored config is rebuilt from.
 */
export const ProviderInputSchema = z
  .object({
    id: ProviderIdSchema,
    name: z.string().trim().min(1).max(100).optional(),
    description: z.string().max(500).optional(),
    transport: TransportKindSchema.optional(),
    enabled: z.boolean().optional(),
    timeoutMs: z.number().int().min(1000).max(300000).optional(),
    command: z.string().trim().min(1).optional(),
    args: z.array(z.string()).optional(),
    env: StringMapSchema.optional(),
    cwd: z.string().min(1).optional(),
    url: z.string().trim().min(1).optional(),
    headers: StringMapSchema.optional(),
  })
  .strict();

export const ProviderPatchSchema = ProviderInputSchema.omit({ id: true }).partial();

/**
 * One entry of the `mcpServers` map in the provider configuration file.
 * Nulls and the legacy `type` field appear in files written by older tooling.
 */
export const ProviderFileEntrySchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  transport: TransportKindSchema.optional(),
  type: z.string().optional(),
  enabled: z.boolean().optional(),
  timeout: z.number().int().min(1).max(300).optional(),
  command: z.string().nullish(),
  args: z.array(z.string()).nullish(),
  env: StringMapSchema.nullish(),
  cwd: z.string().nullish(),
  url: z.string().nullish(),
  headers: StringMapSchema.nullish(),
});

export type ProviderFileEntry = z.infer<typeof ProviderFileEntrySchema>;

export const ProviderFileSchema = z
  .object({
    mcpServers: z.record(z.unknown()).default({}),
  })
  .passthrough();

const LEGACY_TYPES: Record<string, TransportKind> = {
  stdio: 'stdio',
  python: 'stdio',
  http: 'streamable_http',
  streamable_http: 'streamable_http',
  'streamable-http': 'streamable_http',
  sse: 'sse',
};

export interface BuildOptions {
  /** Existing config the input is applied on top of (update, built-in override). */
  base?: ProviderConfig;
  builtIn?: boolean;
  defaultTimeoutMs?: number;
}

/**
 * Validate input and produce a full ProviderConfig.
 * Exactly one of the stdio fields or the url is populated, according to transport.
 */
export function buildProviderConfig(input: ProviderInput, options: BuildOptions = {}): ProviderConfig {
  const parsed = ProviderInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid configuration for provider "${input.id}"`, parsed.error.issues);
  }

  const data = parsed.data;
  const { base } = options;
  const transport = data.transport ?? base?.transport ?? inferTransport(data);

  if (!transport) {
    throw new ValidationError(`Provider "${data.id}" needs a transport, a command or a url`, [
      { path: ['transport'], message: 'Required' },
    ]);
  }

  const common = {
    id: data.id,
    name: data.name ?? base?.name ?? data.id,
    description: data.description ?? base?.description ?? '',
    enabled: data.enabled ?? base?.enabled ?? true,
    builtIn: options.builtIn ?? base?.builtIn ?? false,
    timeoutMs: data.timeoutMs ?? base?.timeoutMs ?? options.defaultTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS,
  };

  if (transport === 'stdio') {
    if (data.url !== undefined || data.headers !== undefined) {
      throw new ValidationError(`stdio provider "${data.id}" cannot have a url or headers`, [
        { path: [data.url !== undefined ? 'url' : 'headers'], message: 'Not allowed for stdio transport' },
      ]);
    }

    const previous = base?.transport === 'stdio' ? base : undefined;
    const command = data.command ?? previous?.command;
    if (!command) {
      throw new ValidationError(`stdio provider "${data.id}" requires a command`, [
        { path: ['command'], message: 'Required' },
      ]);
    }

    const cwd = data.cwd ?? previous?.cwd;
    return {
      ...common,
      transport,
      command,
      args: data.args ?? previous?.args ?? [],
      env: data.env ?? previous?.env ?? {},
      ...(cwd !== undefined ? { cwd } : {}),
    };
  }

  if (data.command !== undefined || data.args !== undefined || data.env !== undefined || data.cwd !== undefined) {
    throw new ValidationError(`${transport} provider "${data.id}" cannot have stdio fields`, [
      { path: ['command'], message: `Not allowed for ${transport} transport` },
    ]);
  }

  const previous = base && base.transport !== 'stdio' ? base : undefined;
  const url = data.url ?? previous?.url;
  if (!url) {
    throw new ValidationError(`${transport} provider "${data.id}" requires a url`, [
      { path: ['url'], message: 'Required' },
    ]);
  }
  assertHttpUrl(data.id, url);

  return {
    ...common,
    transport,
    url,
    headers: data.headers ?? previous?.headers ?? {},
  };
}

function inferTransport(data: { command?: string; url?: string }): TransportKind | undefined {
  if (data.command !== undefined) {
    return 'stdio';
  }
  if (data.url !== undefined) {
    return 'streamable_http';
  }
  return undefined;
}

/**
 * Urls holding placeholders are checked after resolution, at connect time.
 */
function assertHttpUrl(providerId: string, url: string): void {
  if (hasPlaceholders(url)) {
    return;
  }

  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch {
    throw new ValidationError(`Provider "${providerId}" has an invalid url`, [
      { path: ['url'], message: 'Invalid URL' },
    ]);
  }

  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ValidationError(`Provider "${providerId}" url must be http or https`, [
      { path: ['url'], message: `Unsupported protocol ${protocol}` },
    ]);
  }
}

/**
 * Translate a file entry into provider input, mapping legacy fields.
 */
export function fileEntryToInput(id: string, entry: ProviderFileEntry): ProviderInput {
  const legacyTransport = entry.type !== undefined ? LEGACY_TYPES[entry.type.toLowerCase()] : undefined;
  const input: ProviderInput = { id };

  if (entry.name !== undefined) input.name = entry.name;
  if (entry.description !== undefined) input.description = entry.description;
  if (entry.enabled !== undefined) input.enabled = entry.enabled;
  if (entry.timeout !== undefined) input.timeoutMs = entry.timeout * 1000;

  const transport = entry.transport ?? legacyTransport;
  if (transport !== undefined) input.transport = transport;

  if (transport === 'stdio' || (transport === undefined && entry.command)) {
    if (entry.command) input.command = entry.command;
    if (entry.args) input.args = entry.args;
    if (entry.env) input.env = entry.env;
    if (entry.cwd) input.cwd = entry.cwd;
  } else {
    if (entry.url) input.url = entry.url;
    if (entry.headers) input.headers = entry.headers;
  }

  return input;
}

/**
 * Serialize a config for the file. Placeholders are written exactly as stored.
 */
export function toFileEntry(config: ProviderConfig): Record<string, unknown> {
  const common = {
    name: config.name,
    description: config.description,
    transport: config.transport,
    enabled: config.enabled,
    timeout: Math.max(1, Math.round(config.timeoutMs / 1000)),
  };

  if (config.transport === 'stdio') {
    return {
      ...common,
      command: config.command,
      args: config.args,
      env: config.env,
      ...(config.cwd !== undefined ? { cwd: config.cwd } : {}),
    };
  }

  return { ...common, url: config.url, headers: config.headers };
}
