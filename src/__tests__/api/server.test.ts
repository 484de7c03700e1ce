/**
 * Cotação Agro - Testes de integração da API
 *
 * Sobe o app com o repositório em memória:
 * - GET /health
 * - GET /api/reports/winners, /api/reports/full
 * - CRUD de produtos, lojas, cotações e prescrições
 */

import { describe, it, expect, vi } from 'vitest';

vi.mock('../../utils/logger', () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    startup: vi.fn(),
    request: vi.fn(),
    response: vi.fn(),
    report: vi.fn(),
    db: vi.fn(),
    security: vi.fn(),
  }
}));

import request from 'supertest';
import log from '../../utils/logger';
import { createApp } from '../../api/server';
import type { AppConfig } from '../../config';
import { DEFAULT_CORS_ORIGINS } from '../../config';
import type { CatalogRepository } from '../../data/repository';
import { InMemoryCatalogRepository, type MemorySeed } from '../../data/memory';

const ADMIN_PASSWORD = 'test-secret';
const API_KEY = 'test-key';
const DATE = '2024-05-10';

const seed: MemorySeed = {
  products: [{ name: 'Soja', standardUnit: 'KG' }],
  stores: [
    { name: 'Farm1', address: 'Rua A, 1', phone: null },
    { name: 'Farm2', address: 'Rua B, 2', phone: null },
  ],
  quotes: [
    { productId: 1, storeId: 1, price: 50, packagingSize: 25, packagingUnit: 'SC', conversionFactor: 1, date: DATE },
    { productId: 1, storeId: 2, price: 90, packagingSize: 50, packagingUnit: 'SC', conversionFactor: 1, date: DATE },
  ],
  prescriptions: [{ productId: 1, requiredQuantity: 100, requiredUnit: 'KG' }],
};

function makeApp(overrides: Partial<AppConfig> = {}, repository: CatalogRepository = new InMemoryCatalogRepository(seed)) {
  const config: AppConfig = {
    env: 'test',
    port: 0,
    supabase: null,
    adminPassword: ADMIN_PASSWORD,
    apiKeys: [],
    corsAllowedOrigins: DEFAULT_CORS_ORIGINS,
    unitPolicy: 'strict',
    ...overrides,
  };
  return createApp({ config, repository });
}

// Adiciona a senha de administrador
function withAdmin(req: request.Test): request.Test {
  return req.set('X-Admin-Password', ADMIN_PASSWORD);
}

// ============================================================================
// HEALTH CHECK
// ============================================================================

describe('GET /health', () => {

  it('deve retornar status OK e o tipo de armazenamento', async () => {
    const response = await request(makeApp()).get('/health').expect(200);

    expect(response.body).toHaveProperty('status', 'OK');
    expect(response.body).toHaveProperty('success', true);
    expect(response.body).toHaveProperty('storage', 'memory');
  });

});

// ============================================================================
// RELATÓRIOS
// ============================================================================

describe('GET /api/reports', () => {

  it('deve gerar o relatório de vencedores', async () => {
    const response = await request(makeApp())
      .get('/api/reports/winners')
      .query({ date: DATE })
      .expect(200);

    expect(response.body.success).toBe(true);
    expect(response.body.mode).toBe('winner');
    expect(response.body.sections[0].kind).toBe('winner');
    expect(response.body.report).toBe([
      'Relatório de Cotações Vencedoras para 2024-05-10:',
      '',
      "Para 'Soja' (100.00 KG):",
      "  Vencedor: Loja 'Farm2' (Rua B, 2) - Custo Total: R$ 180.00",
      '  Detalhes: Preço R$ 90.00 por 50.00 SC (Conv: 1.00) em 2024-05-10',
      '',
    ].join('\n'));
  });

  it('deve gerar o relatório completo com o ranking', async () => {
    const response = await request(makeApp())
      .get('/api/reports/full?date=2024-05-10')
      .expect(200);

    const [section] = response.body.sections;
    expect(section.kind).toBe('ranked');
    expect(section.ranking.map((r: { status: string; quote: { store: { name: string } } }) =>
      [r.status, r.quote.store.name])).toEqual([['winner', 'Farm2'], ['loser', 'Farm1']]);
    expect(response.body.report).toContain("  #2 Perdedor: Loja 'Farm1' (Rua A, 1) - Custo Total: R$ 200.00");
  });

  it('deve informar quando não há cotação na data', async () => {
    const response = await request(makeApp())
      .get('/api/reports/winners?date=2024-05-11')
      .expect(200);

    expect(response.body.report).toBe(
      "Relatório de Cotações Vencedoras para 2024-05-11:\n\nNenhuma cotação para 'Soja' na data 2024-05-11.\n"
    );
  });

  it('deve ler a política de unidades da configuração', async () => {
    const repository = new InMemoryCatalogRepository({
      ...seed,
      prescriptions: [{ productId: 1, requiredQuantity: 100, requiredUnit: 'kg' }],
    });

    const strict = await request(makeApp({}, repository)).get('/api/reports/winners?date=2024-05-10');
    const relaxed = await request(makeApp({ unitPolicy: 'case-insensitive' }, repository))
      .get('/api/reports/winners?date=2024-05-10');

    expect(strict.body.sections[0].kind).toBe('unit-mismatch');
    expect(relaxed.body.sections[0].kind).toBe('winner');
    expect(relaxed.body.unitPolicy).toBe('case-insensitive');
  });

  it('deve dar 400 com data inválida', async () => {
    const response = await request(makeApp())
      .get('/api/reports/winners?date=2024-02-30')
      .expect(400);

    expect(response.body.success).toBe(false);
    expect(response.body.details[0]).toEqual({ field: 'date', message: 'Data inexistente', code: 'custom' });
  });

  it('deve dar 400 sem data', async () => {
    const response = await request(makeApp()).get('/api/reports/full').expect(400);
    expect(response.body.details[0].message).toBe('Data é obrigatória');
  });

  it('deve dar 503 quando as prescrições não podem ser carregadas', async () => {
    const repository = Object.assign(new InMemoryCatalogRepository(seed), {
      findAllPrescriptions: async () => {
        throw new Error('connection refused');
      },
    });

    const response = await request(makeApp({}, repository))
      .get('/api/reports/full?date=2024-05-10')
      .expect(503);

    expect(response.body.success).toBe(false);
    expect(response.body.report).toContain('Falha ao carregar prescrições.');
  });

  it('deve registrar o status da resposta do relatório', async () => {
    vi.mocked(log.response).mockClear();

    await request(makeApp()).get('/api/reports/winners?date=2024-05-10').expect(200);

    expect(log.response).toHaveBeenCalledWith('GET', '/api/reports/winners?date=2024-05-10', 200, expect.any(Number));
  });

});

// ============================================================================
// AUTENTICAÇÃO
// ============================================================================

describe('Autenticação', () => {

  it('deve dar 401 sem X-Admin-Password', async () => {
    const response = await request(makeApp())
      .post('/api/products')
      .send({ name: 'Trigo', standardUnit: 'KG' })
      .expect(401);

    expect(response.body.success).toBe(false);
  });

  it('deve dar 403 com senha incorreta', async () => {
    await request(makeApp())
      .post('/api/products')
      .set('X-Admin-Password', 'wrong-password')
      .send({ name: 'Trigo', standardUnit: 'KG' })
      .expect(403);
  });

  it('deve exigir chave de API quando configurada', async () => {
    const app = makeApp({ apiKeys: [API_KEY] });

    const missing = await request(app).get('/api/products').expect(401);
    expect(missing.body.code).toBe('MISSING_API_KEY');

    const invalid = await request(app).get('/api/products').set('X-API-Key', 'other-key').expect(403);
    expect(invalid.body.code).toBe('INVALID_API_KEY');

    await request(app).get('/api/products').set('X-API-Key', API_KEY).expect(200);
  });

  it('não deve liberar acesso apenas com X-Requested-With', async () => {
    const app = makeApp({ apiKeys: [API_KEY] });

    const report = await request(app)
      .get('/api/reports/winners?date=2024-05-10')
      .set('X-Requested-With', 'XMLHttpRequest')
      .expect(401);
    expect(report.body.code).toBe('MISSING_API_KEY');

    await request(app).get('/api/products').set('X-Requested-With', 'XMLHttpRequest').expect(401);
  });

});

// ============================================================================
// CRUD
// ============================================================================

describe('CRUD', () => {

  it('deve criar, ler, atualizar e excluir um produto', async () => {
    const app = makeApp({}, new InMemoryCatalogRepository());

    const created = await withAdmin(request(app).post('/api/products'))
      .send({ name: 'Trigo', standardUnit: 'KG' })
      .expect(201);
    expect(created.body.product).toEqual({ id: 1, name: 'Trigo', standardUnit: 'KG' });

    const read = await request(app).get('/api/products/1').expect(200);
    expect(read.body.product.name).toBe('Trigo');

    const updated = await withAdmin(request(app).put('/api/products/1'))
      .send({ name: 'Trigo', standardUnit: 'SC' })
      .expect(200);
    expect(updated.body.product.standardUnit).toBe('SC');

    await withAdmin(request(app).delete('/api/products/1')).expect(200);
    await request(app).get('/api/products/1').expect(404);
  });

  it('deve listar com contagem', async () => {
    const response = await request(makeApp()).get('/api/stores').expect(200);

    expect(response.body.count).toBe(2);
    expect(response.body.stores.map((s: { name: string }) => s.name)).toEqual(['Farm1', 'Farm2']);
  });

  it('deve dar 409 para nome de produto duplicado', async () => {
    const response = await withAdmin(request(makeApp()).post('/api/products'))
      .send({ name: 'Soja', standardUnit: 'KG' })
      .expect(409);

    expect(response.body.code).toBe('CONFLICT');
  });

  it('deve dar 409 ao excluir produto com cotações', async () => {
    const response = await withAdmin(request(makeApp()).delete('/api/products/1')).expect(409);
    expect(response.body.code).toBe('REFERENCE');
  });

  it('deve dar 400 para id inválido e 404 para id inexistente', async () => {
    const app = makeApp();
    await request(app).get('/api/quotes/abc').expect(400);
    await request(app).get('/api/quotes/99').expect(404);
  });

  it('deve criar cotação com fator de conversão padrão e loja resolvida', async () => {
    const response = await withAdmin(request(makeApp()).post('/api/quotes'))
      .send({ productId: 1, storeId: 2, price: 85, packagingSize: 50, packagingUnit: 'SC', date: '2024-05-12' })
      .expect(201);

    expect(response.body.quote).toMatchObject({
      id: 3,
      conversionFactor: 1,
      date: '2024-05-12',
      store: { id: 2, name: 'Farm2' },
    });
  });

  it('deve rejeitar cotação com tamanho de embalagem zero', async () => {
    const response = await withAdmin(request(makeApp()).post('/api/quotes'))
      .send({ productId: 1, storeId: 2, price: 85, packagingSize: 0, packagingUnit: 'SC', date: DATE })
      .expect(400);

    expect(response.body.details[0].field).toBe('packagingSize');
  });

  it('deve filtrar cotações por produto e data', async () => {
    const response = await request(makeApp())
      .get('/api/quotes?productId=1&date=2024-05-10')
      .expect(200);

    expect(response.body.quotes.map((q: { id: number }) => q.id)).toEqual([1, 2]);
  });

  it('deve dar 400 para JSON malformado', async () => {
    const response = await withAdmin(request(makeApp()).post('/api/stores'))
      .set('Content-Type', 'application/json')
      .send('{"name":')
      .expect(400);

    expect(response.body.error).toBe('JSON inválido');
  });

  it('deve dar 404 para rota desconhecida', async () => {
    await request(makeApp()).get('/api/unknown').expect(404);
  });

});
