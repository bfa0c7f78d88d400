export const NOTATION_KINDS = [
  'dotted-hierarchy',
  'dash-enhancement',
  'triple-segment'
] as const;

export type NotationKind = (typeof NOTATION_KINDS)[number];

export const GROUP_ID_STYLES = ['abbreviation', 'slug'] as const;

export type GroupIdStyle = (typeof GROUP_ID_STYLES)[number];

const ABBREVIATION_PATTERN = /\(([^()]*)/;
const LEADING_ZEROS_PATTERN = /^0+(?=\d)/;
const TRAILING_COMMAS_PATTERN = /,+$/;
const SLUG_SEPARATOR_PATTERN = /[.()\s]+/g;
const MULTI_HYPHEN_PATTERN = /-+/g;
const EDGE_HYPHEN_PATTERN = /^-+|-+$/g;
const LEAF_CONTROL_PATTERN = /-\d+(?:\.\d+)?$/;

export function isNotationKind(value: string): value is NotationKind {
  return NOTATION_KINDS.some((kind) => kind === value);
}

export function isGroupIdStyle(value: string): value is GroupIdStyle {
  return GROUP_ID_STYLES.some((style) => style === value);
}

function stripLeadingZeros(token: string): string {
  const trimmed = token.trim();
  return trimmed.replace(LEADING_ZEROS_PATTERN, '');
}

function titleHead(text: string): string {
  return text.split(':')[0].trim();
}

/**
 * `GOVERN (GV): ...` -> `gv`, `GV.OC-01: ...` -> `gv.oc-01`.
 */
export function canonicalizeDottedHierarchy(raw: string): string {
  const head = titleHead(raw).toLowerCase();
  if (head.includes('(') && head.includes(')')) {
    const match = head.match(ABBREVIATION_PATTERN);
    if (match) {
      return match[1].trim();
    }
  }
  return head;
}

/**
 * `AC-01` -> `ac-1`, `AC-2(1)` -> `ac-2.1`.
 */
export function canonicalizeDashEnhancement(raw: string): string {
  const value = raw.trim().replace(TRAILING_COMMAS_PATTERN, '').toLowerCase();
  const separatorIndex = value.indexOf('-');
  if (separatorIndex === -1) {
    return value;
  }

  const family = value.slice(0, separatorIndex);
  const remainder = value.slice(separatorIndex + 1);

  if (remainder.includes('(')) {
    const openIndex = remainder.indexOf('(');
    const base = stripLeadingZeros(remainder.slice(0, openIndex));
    const enhancement = stripLeadingZeros(remainder.slice(openIndex + 1).replace(/\)+$/, ''));
    return `${family}-${base}.${enhancement}`;
  }

  return `${family}-${stripLeadingZeros(remainder)}`;
}

/**
 * `AC-02-01` -> `ac-2.1`, `AC-01-00` -> `ac-1`.
 */
export function canonicalizeTripleSegment(raw: string): string {
  const value = raw.trim().toLowerCase();
  const segments = value.split('-');
  if (segments.length !== 3) {
    return value;
  }

  const [family, baseNum, enhancementNum] = segments;
  const base = stripLeadingZeros(baseNum);
  if (enhancementNum === '00') {
    return `${family}-${base}`;
  }
  return `${family}-${base}.${stripLeadingZeros(enhancementNum)}`;
}

const CANONICALIZERS: Record<NotationKind, (raw: string) => string> = {
  'dotted-hierarchy': canonicalizeDottedHierarchy,
  'dash-enhancement': canonicalizeDashEnhancement,
  'triple-segment': canonicalizeTripleSegment
};

/**
 * Maps a raw identifier in the given notation to its canonical form.
 * Blank input yields `''`, which callers treat as "no identifier".
 */
export function canonicalize(raw: string | null | undefined, notation: NotationKind): string {
  if (raw === null || raw === undefined || raw.trim() === '') {
    return '';
  }
  return CANONICALIZERS[notation](raw);
}

/**
 * Group id in the slug style: `Organizational Context (GV.OC): ...` -> `organizational-context-gv-oc`.
 */
export function slugifyTitle(raw: string | null | undefined): string {
  if (raw === null || raw === undefined) {
    return '';
  }
  return titleHead(raw)
    .toLowerCase()
    .replace(SLUG_SEPARATOR_PATTERN, '-')
    .replaceAll(',', '')
    .replace(MULTI_HYPHEN_PATTERN, '-')
    .replace(EDGE_HYPHEN_PATTERN, '');
}

export function canonicalizeGroupId(raw: string, style: GroupIdStyle): string {
  return style === 'slug' ? slugifyTitle(raw) : canonicalize(raw, 'dotted-hierarchy');
}

// Category-level ids (`gv`, `gv.oc`, `ac`) carry no numeric control suffix.
export function isLeafControlId(id: string): boolean {
  return LEAF_CONTROL_PATTERN.test(id);
}
