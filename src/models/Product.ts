/**
 * Cotação Agro - Sistema de Cotação de Produto Agrícola
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Um produto agrícola cotado pelas lojas
 */
export interface Product {
  id: number;
  name: string;
  standardUnit: string; // unidade padrão, ex. "KG"
}

export type ProductInput = Omit<Product, 'id'>;
