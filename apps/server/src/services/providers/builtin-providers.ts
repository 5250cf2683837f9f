import type { ProviderConfig } from '@server/core/interfaces';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from './provider-config.schema';

/**
 * Providers that ship with the gateway. They can be reconfigured and
 * disabled through the registry but never removed.
 */
export const BUILTIN_PROVIDERS: readonly ProviderConfig[] = [
  {
    id: 'mssql',
    name: 'MSSQL Server',
    description: 'SQL Server database access',
    transport: 'stdio',
    enabled: true,
    builtIn: true,
    timeoutMs: DEFAULT_PROVIDER_TIMEOUT_MS,
    command: 'node',
    args: ['${MCP_MSSQL_PATH}'],
    env: {
      SERVER_NAME: '${SQL_SERVER_HOST}',
      DATABASE_NAME: '${SQL_DATABASE_NAME}',
      TRUST_SERVER_CERTIFICATE: 'true',
    },
  },
  {
    id: 'analytics-management',
    name: 'Analytics Management',
    description: 'Dashboard, widget, and saved query management',
    transport: 'stdio',
    enabled: true,
    builtIn: true,
    timeoutMs: DEFAULT_PROVIDER_TIMEOUT_MS,
    command: 'uv',
    args: ['run', 'python', '-m', 'src.mcp.analytics_mcp_server'],
    env: {
      BACKEND_DB_HOST: '${BACKEND_DB_HOST:-localhost}',
      BACKEND_DB_PORT: '${BACKEND_DB_PORT:-1434}',
      BACKEND_DB_NAME: '${BACKEND_DB_NAME:-LLM_BackEnd}',
    },
  },
  {
    id: 'data-analytics',
    name: 'Data Analytics',
    description: 'Statistical analysis, aggregations, time series, anomaly detection',
    transport: 'stdio',
    enabled: true,
    builtIn: true,
    timeoutMs: DEFAULT_PROVIDER_TIMEOUT_MS,
    command: 'uv',
    args: ['run', 'python', '-m', 'src.mcp.data_analytics_mcp_server'],
    env: {
      SQL_SERVER_HOST: '${SQL_SERVER_HOST:-localhost}',
      SQL_SERVER_PORT: '${SQL_SERVER_PORT:-1433}',
      SQL_DATABASE_NAME: '${SQL_DATABASE_NAME:-ResearchAnalytics}',
      BACKEND_DB_HOST: '${BACKEND_DB_HOST:-localhost}',
      BACKEND_DB_PORT: '${BACKEND_DB_PORT:-1434}',
      BACKEND_DB_NAME: '${BACKEND_DB_NAME:-LLM_BackEnd}',
    },
  },
];

export function isBuiltinProvider(id: string): boolean {
  return BUILTIN_PROVIDERS.some((provider) => provider.id === id);
}
