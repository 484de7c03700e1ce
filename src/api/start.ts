import { ConfigError, DEV_ADMIN_PASSWORD, loadConfig } from '../config';
import type { CatalogRepository } from '../data/repository';
import { InMemoryCatalogRepository } from '../data/memory';
import log from '../utils/logger';
import { createApp } from './server';
import { createSupabaseClients, SupabaseCatalogRepository } from './supabase';

function main() {
  const config = loadConfig();

  if (config.adminPassword === DEV_ADMIN_PASSWORD) {
    log.warn('ADMIN_PASSWORD não definido - usando "admin123" (somente desenvolvimento)');
  }
  if (config.apiKeys.length > 0) {
    log.info(`${config.apiKeys.length} chave(s) de API configurada(s)`);
  }

  let repository: CatalogRepository;
  if (config.supabase) {
    repository = new SupabaseCatalogRepository(createSupabaseClients(config.supabase));
  } else {
    log.warn('SUPABASE_URL/SUPABASE_KEY ausentes - usando repositório em memória (dados não persistem)');
    repository = new InMemoryCatalogRepository();
  }

  const app = createApp({ config, repository });

  app.listen(config.port, () => {
    log.startup('Cotação Agro - relatório de cotações de produtos agrícolas');
    log.startup(`Servidor em: http://localhost:${config.port}`);
    log.startup(`API: http://localhost:${config.port}/api`);
    log.startup(`Docs: http://localhost:${config.port}/api-docs`);
    log.startup(`Health: http://localhost:${config.port}/health`);
  });
}

try {
  main();
} catch (error) {
  if (error instanceof ConfigError) {
    log.error('Configuração inválida', error);
    process.exit(1);
  }
  throw error;
}
