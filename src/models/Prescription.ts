import type { Product } from './Product';

/**
 * Quanto de um produto, e em qual unidade, é necessário
 */
export interface Prescription {
  id: number;
  productId: number;
  requiredQuantity: number;
  requiredUnit: string;
}

/**
 * Prescrição com o produto resolvido (null quando a referência não existe mais)
 */
export interface PrescriptionWithProduct extends Prescription {
  product: Product | null;
}

export type PrescriptionInput = Omit<Prescription, 'id'>;
