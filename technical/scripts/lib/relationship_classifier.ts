export const RELATIONSHIP_KINDS = [
  'equal-to',
  'equivalent-to',
  'superset-of',
  'subset-of',
  'intersects-with',
  'no-relationship',
  'withdrawn',
  'withdrawn-in-source-only',
  'restored-in-target',
  'withdrawn-in-target-only',
  'withdrawn-error'
] as const;

export type RelationshipKind = (typeof RELATIONSHIP_KINDS)[number];

export function isRelationshipKind(value: string): value is RelationshipKind {
  return RELATIONSHIP_KINDS.some((kind) => kind === value);
}

export interface LifecyclePhrases {
  withdrawnInSource: string;
  previouslyWithdrawnInSource: string;
  restoredInTarget: string;
  withdrawnMarker: string;
}

export interface RelationshipPhrases {
  lifecycle: LifecyclePhrases;
  noChangeMarker: string;
  newControl: string[];
  neutral: string[];
  adds: string[];
  removes: string[];
  changesControl: string[];
}

export interface RelationshipPhrasesOverride {
  lifecycle?: Partial<LifecyclePhrases>;
  noChangeMarker?: string;
  newControl?: string[];
  neutral?: string[];
  adds?: string[];
  removes?: string[];
  changesControl?: string[];
}

export const DEFAULT_RELATIONSHIP_PHRASES: RelationshipPhrases = {
  lifecycle: {
    withdrawnInSource: 'withdrawn in source',
    previouslyWithdrawnInSource: 'previously withdrawn in source',
    restoredInTarget: 'restored in target',
    withdrawnMarker: 'withdrawn'
  },
  noChangeMarker: 'n',
  newControl: ['new base control', 'new control enhancement'],
  neutral: ['changes discussion', 'adds discussion', 'changes title', 'adds to'],
  adds: ['adds control text', 'adds parameter'],
  removes: ['removes parameter', 'removes control text'],
  changesControl: ['changes control text', 'changes parameter']
};

function normalizePhrase(value: string): string {
  return value.trim().toLowerCase();
}

function mergePhraseList(base: string[], extra: string[] | undefined): string[] {
  const merged = [...base];
  for (const phrase of extra ?? []) {
    const normalized = normalizePhrase(phrase);
    if (normalized && !merged.includes(normalized)) {
      merged.push(normalized);
    }
  }
  return merged;
}

function pickPhrase(base: string, value: string | undefined): string {
  if (value === undefined) {
    return base;
  }
  const normalized = normalizePhrase(value);
  return normalized ? normalized : base;
}

/**
 * Lifecycle phrases and markers in the override replace the base values;
 * phrase lists are appended to the base lists.
 */
export function mergeRelationshipPhrases(
  base: RelationshipPhrases,
  override: RelationshipPhrasesOverride = {}
): RelationshipPhrases {
  const lifecycle = override.lifecycle ?? {};

  return {
    lifecycle: {
      withdrawnInSource: pickPhrase(base.lifecycle.withdrawnInSource, lifecycle.withdrawnInSource),
      previouslyWithdrawnInSource: pickPhrase(
        base.lifecycle.previouslyWithdrawnInSource,
        lifecycle.previouslyWithdrawnInSource
      ),
      restoredInTarget: pickPhrase(base.lifecycle.restoredInTarget, lifecycle.restoredInTarget),
      withdrawnMarker: pickPhrase(base.lifecycle.withdrawnMarker, lifecycle.withdrawnMarker)
    },
    noChangeMarker: pickPhrase(base.noChangeMarker, override.noChangeMarker),
    newControl: mergePhraseList(base.newControl, override.newControl),
    neutral: mergePhraseList(base.neutral, override.neutral),
    adds: mergePhraseList(base.adds, override.adds),
    removes: mergePhraseList(base.removes, override.removes),
    changesControl: mergePhraseList(base.changesControl, override.changesControl)
  };
}

export interface ChangeSignals {
  changedElements: string;
  changeDetails: string;
  withdrawnInSource: boolean;
  previouslyWithdrawnInSource: boolean;
  restoredInTarget: boolean;
  withdrawnInTarget: boolean;
}

export interface ClassificationRule {
  name: string;
  evaluate: (signals: ChangeSignals, phrases: RelationshipPhrases) => RelationshipKind | null;
}

function normalizeSignal(value: string | null | undefined): string {
  return value === null || value === undefined ? '' : value.trim().toLowerCase();
}

export function readChangeSignals(
  changedElements: string | null | undefined,
  changeDetails: string | null | undefined,
  phrases: RelationshipPhrases = DEFAULT_RELATIONSHIP_PHRASES
): ChangeSignals {
  const elements = normalizeSignal(changedElements);
  const details = normalizeSignal(changeDetails);
  const { lifecycle } = phrases;

  return {
    changedElements: elements,
    changeDetails: details,
    withdrawnInSource: details.includes(lifecycle.withdrawnInSource),
    previouslyWithdrawnInSource: details.includes(lifecycle.previouslyWithdrawnInSource),
    restoredInTarget: details.includes(lifecycle.restoredInTarget),
    withdrawnInTarget: elements === lifecycle.withdrawnMarker
  };
}

function containsAny(text: string, phrases: string[]): boolean {
  return phrases.some((phrase) => text.includes(phrase));
}

function substantiveLines(signals: ChangeSignals, phrases: RelationshipPhrases): string[] {
  return signals.changedElements
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .filter(
      (line) =>
        line !== phrases.noChangeMarker &&
        !phrases.neutral.some((neutral) => line.startsWith(neutral))
    );
}

function classifySubstantiveChange(lines: string[], phrases: RelationshipPhrases): RelationshipKind {
  const hasChangesControl = lines.some((line) => containsAny(line, phrases.changesControl));
  const hasAdds = lines.some((line) => containsAny(line, phrases.adds));
  const hasRemoves = lines.some((line) => containsAny(line, phrases.removes));

  if (hasChangesControl) {
    return 'intersects-with';
  }
  if (hasAdds && hasRemoves) {
    return 'intersects-with';
  }
  if (hasAdds) {
    return 'superset-of';
  }
  if (hasRemoves) {
    return 'subset-of';
  }
  return 'intersects-with';
}

// Lifecycle rules come first: withdrawal and restoration override any
// substantive-change analysis of the same row.
export const RELATIONSHIP_RULES: readonly ClassificationRule[] = [
  {
    name: 'restored-in-target',
    evaluate: (s) => (s.withdrawnInSource && s.restoredInTarget ? 'restored-in-target' : null)
  },
  {
    name: 'withdrawn-in-source-only',
    evaluate: (s) => (s.previouslyWithdrawnInSource ? 'withdrawn-in-source-only' : null)
  },
  {
    name: 'withdrawn',
    evaluate: (s) =>
      s.withdrawnInSource && s.withdrawnInTarget && !s.restoredInTarget ? 'withdrawn' : null
  },
  {
    name: 'withdrawn-in-target-only',
    evaluate: (s) => (s.withdrawnInTarget ? 'withdrawn-in-target-only' : null)
  },
  {
    name: 'withdrawn-error',
    evaluate: (s) => (s.withdrawnInSource ? 'withdrawn-error' : null)
  },
  {
    name: 'new-control',
    evaluate: (s, phrases) =>
      containsAny(s.changedElements, phrases.newControl) ? 'no-relationship' : null
  },
  {
    name: 'no-change',
    evaluate: (s, phrases) => (s.changedElements === phrases.noChangeMarker ? 'equal-to' : null)
  },
  {
    name: 'neutral-only',
    evaluate: (s, phrases) => (substantiveLines(s, phrases).length === 0 ? 'equivalent-to' : null)
  },
  {
    name: 'substantive-change',
    evaluate: (s, phrases) => classifySubstantiveChange(substantiveLines(s, phrases), phrases)
  }
];

export function classifySignals(
  signals: ChangeSignals,
  phrases: RelationshipPhrases = DEFAULT_RELATIONSHIP_PHRASES
): RelationshipKind {
  for (const rule of RELATIONSHIP_RULES) {
    const kind = rule.evaluate(signals, phrases);
    if (kind !== null) {
      return kind;
    }
  }
  return 'intersects-with';
}

export function classifyRelationship(
  changedElements: string | null | undefined,
  changeDetails: string | null | undefined,
  phrases: RelationshipPhrases = DEFAULT_RELATIONSHIP_PHRASES
): RelationshipKind {
  return classifySignals(readChangeSignals(changedElements, changeDetails, phrases), phrases);
}

export interface ComparisonRow {
  identifier: string;
  title: string;
  targetIdentifier: string;
  changedElements: string;
  changeDetails: string;
}

export interface ClassifiedComparisonRow extends ComparisonRow {
  relationship: RelationshipKind;
}

export function classifyComparisonRow(
  row: ComparisonRow,
  phrases: RelationshipPhrases = DEFAULT_RELATIONSHIP_PHRASES
): ClassifiedComparisonRow {
  return {
    ...row,
    relationship: classifyRelationship(row.changedElements, row.changeDetails, phrases)
  };
}

export function countRelationships(
  kinds: Iterable<RelationshipKind>
): Record<RelationshipKind, number> {
  const counts: Record<RelationshipKind, number> = {
    'equal-to': 0,
    'equivalent-to': 0,
    'superset-of': 0,
    'subset-of': 0,
    'intersects-with': 0,
    'no-relationship': 0,
    withdrawn: 0,
    'withdrawn-in-source-only': 0,
    'restored-in-target': 0,
    'withdrawn-in-target-only': 0,
    'withdrawn-error': 0
  };
  for (const kind of kinds) {
    counts[kind] += 1;
  }
  return counts;
}
