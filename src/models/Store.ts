/**
 * Loja (fornecedor) que emite cotações
 */
export interface Store {
  id: number;
  name: string;
  address: string;
  phone: string | null;
}

export type StoreInput = Omit<Store, 'id'>;
