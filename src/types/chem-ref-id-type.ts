/** Kinds of chemical reference definitions, each kept in its own repository. */
export const CHEM_REF_ID_TYPES = ['CC', 'PRDCC', 'PRD', 'PRD_FAMILY'] as const;

export type ChemRefIdType = (typeof CHEM_REF_ID_TYPES)[number];

export function isChemRefIdType(value: string): value is ChemRefIdType {
  return CHEM_REF_ID_TYPES.some((t) => t === value);
}
