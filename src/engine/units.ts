/**
 * Compatibilidade entre a unidade requerida de uma prescrição e a unidade padrão do produto.
 *
 * Nenhuma conversão física é feita aqui; apenas decide se as duas unidades
 * podem ser comparadas diretamente.
 */
export interface UnitPolicy {
  name: UnitPolicyName;
  isCompatible(requiredUnit: string, standardUnit: string): boolean;
}

export const UNIT_POLICY_NAMES = ['strict', 'case-insensitive'] as const;

export type UnitPolicyName = typeof UNIT_POLICY_NAMES[number];

export const strictUnitPolicy: UnitPolicy = {
  name: 'strict',
  isCompatible: (requiredUnit, standardUnit) => requiredUnit === standardUnit,
};

// "kg " e "KG" são a mesma unidade
export const caseInsensitiveUnitPolicy: UnitPolicy = {
  name: 'case-insensitive',
  isCompatible: (requiredUnit, standardUnit) =>
    requiredUnit.trim().toUpperCase() === standardUnit.trim().toUpperCase(),
};

export function getUnitPolicy(name: UnitPolicyName): UnitPolicy {
  return name === 'case-insensitive' ? caseInsensitiveUnitPolicy : strictUnitPolicy;
}
