/**
 * Configuração da aplicação a partir de variáveis de ambiente (.env via dotenv)
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { UNIT_POLICY_NAMES, type UnitPolicyName } from '../engine/units';

dotenv.config();

const csv = (value: string | undefined): string[] =>
  (value || '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_KEY: z.string().min(1).optional(),
  SUPABASE_SERVICE_KEY: z.string().min(1).optional(),
  ADMIN_PASSWORD: z.string().min(1).optional(),
  API_KEYS: z.string().optional(),
  CORS_ALLOWED_ORIGINS: z.string().optional(),
  UNIT_POLICY: z.enum(UNIT_POLICY_NAMES).default('strict'),
});

export interface SupabaseSettings {
  url: string;
  key: string;
  serviceKey?: string;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  /** null quando as credenciais não estão configuradas */
  supabase: SupabaseSettings | null;
  adminPassword: string;
  /** Vazio = acesso aberto (desenvolvimento) */
  apiKeys: string[];
  corsAllowedOrigins: string[];
  unitPolicy: UnitPolicyName;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Somente para desenvolvimento; em produção ADMIN_PASSWORD é obrigatório
export const DEV_ADMIN_PASSWORD = 'admin123';

export const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:3000'];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuração inválida - ${problems.join('; ')}`);
  }

  const vars = result.data;
  const isProduction = vars.NODE_ENV === 'production';

  if (isProduction && !vars.ADMIN_PASSWORD) {
    throw new ConfigError('ADMIN_PASSWORD precisa ser definido em produção');
  }

  const supabase = vars.SUPABASE_URL && vars.SUPABASE_KEY
    ? { url: vars.SUPABASE_URL, key: vars.SUPABASE_KEY, serviceKey: vars.SUPABASE_SERVICE_KEY }
    : null;

  if (isProduction && supabase === null) {
    throw new ConfigError('SUPABASE_URL e SUPABASE_KEY precisam ser definidos em produção');
  }

  const corsAllowedOrigins = csv(vars.CORS_ALLOWED_ORIGINS);

  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    supabase,
    adminPassword: vars.ADMIN_PASSWORD || DEV_ADMIN_PASSWORD,
    apiKeys: csv(vars.API_KEYS),
    corsAllowedOrigins: corsAllowedOrigins.length > 0 ? corsAllowedOrigins : DEFAULT_CORS_ORIGINS,
    unitPolicy: vars.UNIT_POLICY,
  };
}
