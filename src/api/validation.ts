/**
 * Cotação Agro - Validação de entrada da API
 *
 * Usa Zod para validação tipada de todas as requisições.
 */

import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import log from '../utils/logger';

// =============================================================================
// ESQUEMAS BÁSICOS
// =============================================================================

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * true se a string é uma data de calendário que existe (2024-02-30 não existe)
 */
export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;

  const [, year, month, day] = match.map(Number);
  const date = new Date(0);
  // setUTCFullYear não desloca os anos 0-99 para 1900
  date.setUTCFullYear(year, month - 1, day);
  return date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day;
}

export const CalendarDateSchema = z
  .string({ required_error: 'Data é obrigatória' })
  .regex(ISO_DATE, 'Formato de data inválido (use YYYY-MM-DD)')
  .refine(isCalendarDate, { message: 'Data inexistente' });

export const IdSchema = z.coerce.number().int().positive();

const Unit = z.string().trim().min(1, 'Unidade é obrigatória').max(20);

// =============================================================================
// ESQUEMAS DOS ENDPOINTS
// =============================================================================

/**
 * POST/PUT /api/products
 */
export const ProductSchema = z.object({
  name: z.string().trim().min(1, 'Nome é obrigatório').max(200),
  standardUnit: Unit,
});

/**
 * POST/PUT /api/stores
 */
export const StoreSchema = z.object({
  name: z.string().trim().min(1, 'Nome é obrigatório').max(200),
  address: z.string().trim().min(1, 'Endereço é obrigatório').max(300),
  phone: z.string().trim().max(40).nullish()
    .transform((phone) => (phone ? phone : null)),
});

/**
 * POST/PUT /api/quotes
 */
export const QuoteSchema = z.object({
  productId: z.number().int().positive(),
  storeId: z.number().int().positive(),
  price: z.number().positive('Preço deve ser maior que zero'),
  packagingSize: z.number().positive('Tamanho da embalagem deve ser maior que zero'),
  packagingUnit: Unit,
  conversionFactor: z.number().positive('Fator de conversão deve ser maior que zero').default(1.0),
  date: CalendarDateSchema,
});

/**
 * POST/PUT /api/prescriptions
 */
export const PrescriptionSchema = z.object({
  productId: z.number().int().positive(),
  requiredQuantity: z.number().positive('Quantidade requerida deve ser maior que zero'),
  requiredUnit: Unit,
});

/**
 * GET /api/reports/*
 */
export const ReportQuerySchema = z.object({
  date: CalendarDateSchema,
});

/**
 * GET /api/quotes
 */
export const QuoteListQuerySchema = z.object({
  productId: IdSchema.optional(),
  date: CalendarDateSchema.optional(),
});

export type ProductBody = z.infer<typeof ProductSchema>;
export type StoreBody = z.infer<typeof StoreSchema>;
export type QuoteBody = z.infer<typeof QuoteSchema>;
export type PrescriptionBody = z.infer<typeof PrescriptionSchema>;
export type ReportQuery = z.infer<typeof ReportQuerySchema>;
export type QuoteListQuery = z.infer<typeof QuoteListQuerySchema>;

// =============================================================================
// MIDDLEWARE DE VALIDAÇÃO
// =============================================================================

export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
}

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((err: z.ZodIssue) => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code,
  }));
}

/**
 * Middleware que valida o body contra um esquema Zod
 */
export function validateBody<T extends z.ZodTypeAny>(schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const errors = toIssues(result.error);

      log.warn('Erro de validação', {
        path: req.path,
        errors,
      });

      return res.status(400).json({
        success: false,
        error: 'Erro de validação',
        details: errors,
      });
    }

    // Substitui o body pelos dados validados e transformados
    req.body = result.data;
    next();
  };
}

/**
 * Valida os parâmetros de query; o resultado fica em res.locals.query
 */
export function validateQuery<T extends z.ZodTypeAny>(schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.query);

    if (!result.success) {
      return res.status(400).json({
        success: false,
        error: 'Parâmetros de consulta inválidos',
        details: toIssues(result.error),
      });
    }

    res.locals.query = result.data;
    next();
  };
}

/**
 * Valida :id da rota
 */
export function parseId(raw: string): number | null {
  const result = IdSchema.safeParse(raw);
  return result.success ? result.data : null;
}
