import { singleton } from 'tsyringe';
import { assertNever } from '../runtime/assert-never.js';

type AccessionStyle = 'as-is' | 'emdb-hyphen' | 'emdb-underscore';

interface NameRule {
  readonly publicName: (accession: string) => string;
  readonly releaseName: (accession: string) => string;
  readonly publicGzip: boolean;
  readonly releaseGzip: boolean;
  readonly publicAccession: AccessionStyle;
  readonly releaseAccession: AccessionStyle;
}

export type ReleasedContent =
  | 'model'
  | 'sf'
  | 'cs'
  | 'nmr-data'
  | 'emdb-xml'
  | 'emdb-map'
  | 'emdb-fsc'
  | 'validation-pdf'
  | 'validation-full-pdf'
  | 'validation-xml'
  | 'validation-png'
  | 'validation-svg'
  | 'validation-2fofc'
  | 'validation-fofc';

function rule(
  publicName: (a: string) => string,
  releaseName: (a: string) => string,
  publicGzip: boolean,
  releaseGzip: boolean,
  accession: readonly [AccessionStyle, AccessionStyle] = ['as-is', 'as-is']
): NameRule {
  return { publicName, releaseName, publicGzip, releaseGzip, publicAccession: accession[0], releaseAccession: accession[1] };
}

const same = (fn: (a: string) => string) => [fn, fn] as const;

const RULES: Readonly<Record<ReleasedContent, NameRule>> = {
  model: rule(...same((a) => `${a}.cif`), true, true),
  sf: rule((a) => `r${a}sf.ent`, (a) => `${a}-sf.cif`, true, false),
  cs: rule(...same((a) => `${a}_cs.str`), true, false),
  'nmr-data': rule(...same((a) => `${a}_nmr-data.str`), true, false),
  'emdb-xml': rule((a) => `${a}-v30.xml`, (a) => `${a}_v3.xml`, false, false, ['emdb-hyphen', 'emdb-underscore']),
  'emdb-map': rule(...same((a) => `${a}.map`), true, true, ['emdb-underscore', 'emdb-underscore']),
  'emdb-fsc': rule(...same((a) => `${a}_fsc.xml`), false, false, ['emdb-underscore', 'emdb-underscore']),
  'validation-pdf': rule(...same((a) => `${a}_validation.pdf`), false, false),
  'validation-full-pdf': rule(...same((a) => `${a}_full_validation.pdf`), false, false),
  'validation-xml': rule(...same((a) => `${a}_validation.xml`), false, false),
  'validation-png': rule(...same((a) => `${a}_multipercentile_validation.png`), false, false),
  'validation-svg': rule(...same((a) => `${a}_multipercentile_validation.svg`), false, false),
  'validation-2fofc': rule(...same((a) => `${a}_validation_2fo-fc_map_coef.cif`), false, false),
  'validation-fofc': rule(...same((a) => `${a}_validation_fo-fc_map_coef.cif`), false, false),
};

/** `EMD-1234` → `1234`: everything after the four-character prefix. */
function emdbNumber(accession: string): string {
  return accession.slice(4);
}

export function toEmdbHyphen(accession: string): string {
  return `emd-${emdbNumber(accession)}`;
}

export function toEmdbUnderscore(accession: string): string {
  return `emd_${emdbNumber(accession)}`;
}

function applyStyle(style: AccessionStyle, accession: string): string {
  switch (style) {
    case 'as-is':
      return accession;
    case 'emdb-hyphen':
      return toEmdbHyphen(accession);
    case 'emdb-underscore':
      return toEmdbUnderscore(accession);
    default:
      return assertNever(style);
  }
}

/**
 * Filenames of released content, either as published in the public archive
 * or as staged in the for-release area (`forRelease = true`).
 */
@singleton()
export class ReleaseFileNames {
  fileName(content: ReleasedContent, accession: string, forRelease = false): string {
    const r = RULES[content];
    const id = applyStyle(forRelease ? r.releaseAccession : r.publicAccession, accession);
    const name = forRelease ? r.releaseName(id) : r.publicName(id);
    const gzip = forRelease ? r.releaseGzip : r.publicGzip;
    return gzip ? `${name}.gz` : name;
  }

  getModel(accession: string, forRelease = false): string {
    return this.fileName('model', accession, forRelease);
  }

  getStructureFactor(accession: string, forRelease = false): string {
    return this.fileName('sf', accession, forRelease);
  }

  getChemicalShifts(accession: string, forRelease = false): string {
    return this.fileName('cs', accession, forRelease);
  }

  getNmrData(accession: string, forRelease = false): string {
    return this.fileName('nmr-data', accession, forRelease);
  }

  getEmdbXml(accession: string, forRelease = false): string {
    return this.fileName('emdb-xml', accession, forRelease);
  }

  getEmdbMap(accession: string, forRelease = false): string {
    return this.fileName('emdb-map', accession, forRelease);
  }

  getEmdbFsc(accession: string, forRelease = false): string {
    return this.fileName('emdb-fsc', accession, forRelease);
  }

  getValidationPdf(accession: string, forRelease = false): string {
    return this.fileName('validation-pdf', accession, forRelease);
  }

  getValidationFullPdf(accession: string, forRelease = false): string {
    return this.fileName('validation-full-pdf', accession, forRelease);
  }

  getValidationXml(accession: string, forRelease = false): string {
    return this.fileName('validation-xml', accession, forRelease);
  }

  getValidationPng(accession: string, forRelease = false): string {
    return this.fileName('validation-png', accession, forRelease);
  }

  getValidationSvg(accession: string, forRelease = false): string {
    return this.fileName('validation-svg', accession, forRelease);
  }

  getValidation2fofc(accession: string, forRelease = false): string {
    return this.fileName('validation-2fofc', accession, forRelease);
  }

  getValidationFofc(accession: string, forRelease = false): string {
    return this.fileName('validation-fofc', accession, forRelease);
  }
}

export const RELEASED_CONTENT: readonly ReleasedContent[] = Object.keys(RULES).filter(
  (k): k is ReleasedContent => k in RULES
);
