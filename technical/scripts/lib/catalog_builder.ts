import { canonicalize, canonicalizeGroupId, type GroupIdStyle } from './control_identifier.js';

export interface CatalogRow {
  function?: string;
  category?: string;
  subcategory?: string;
  examples?: string;
}

export type ControlPartName = 'statement' | 'example';

export interface ControlPart {
  id: string;
  name: ControlPartName;
  prose: string;
}

export interface CatalogControl {
  kind: 'control';
  id: string;
  title: string;
  parts: ControlPart[];
}

export interface CatalogCategory {
  kind: 'category';
  id: string;
  title: string;
  controls: CatalogControl[];
}

export interface CatalogFunction {
  kind: 'function';
  id: string;
  title: string;
  categories: CatalogCategory[];
}

export type CatalogNode = CatalogFunction | CatalogCategory | CatalogControl;

export interface Catalog {
  functions: CatalogFunction[];
}

export type DropReason = 'no-open-function' | 'no-open-category' | 'duplicate-control-id';

export interface DroppedCatalogRow {
  rowIndex: number;
  level: 'category' | 'subcategory';
  text: string;
  reason: DropReason;
}

export interface CatalogBuildOptions {
  groupIdStyle?: GroupIdStyle;
}

export interface CatalogBuildResult {
  catalog: Catalog;
  dropped: DroppedCatalogRow[];
}

interface CatalogAccumulator {
  catalog: Catalog;
  currentFunction: CatalogFunction | null;
  currentCategory: CatalogCategory | null;
  controlIds: Set<string>;
  dropped: DroppedCatalogRow[];
}

function cellText(value: string | undefined): string | null {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function buildControl(text: string, examples: string | null): CatalogControl {
  const id = canonicalize(text, 'dotted-hierarchy');
  const separatorIndex = text.indexOf(':');
  const title = separatorIndex === -1 ? text.trim() : text.slice(0, separatorIndex).trim();
  const prose = separatorIndex === -1 ? '' : text.slice(separatorIndex + 1).trim();

  const parts: ControlPart[] = [{ id: `${id}_smt`, name: 'statement', prose }];
  if (examples) {
    parts.push({ id: `${id}_eg`, name: 'example', prose: examples });
  }

  return { kind: 'control', id, title, parts };
}

function applyRow(
  acc: CatalogAccumulator,
  row: CatalogRow,
  rowIndex: number,
  groupIdStyle: GroupIdStyle
): CatalogAccumulator {
  const functionText = cellText(row.function);
  if (functionText) {
    const node: CatalogFunction = {
      kind: 'function',
      id: canonicalizeGroupId(functionText, groupIdStyle),
      title: functionText,
      categories: []
    };
    acc.catalog.functions.push(node);
    acc.currentFunction = node;
  }

  const categoryText = cellText(row.category);
  if (categoryText) {
    if (acc.currentFunction) {
      const node: CatalogCategory = {
        kind: 'category',
        id: canonicalizeGroupId(categoryText, groupIdStyle),
        title: categoryText,
        controls: []
      };
      acc.currentFunction.categories.push(node);
      acc.currentCategory = node;
    } else {
      acc.dropped.push({ rowIndex, level: 'category', text: categoryText, reason: 'no-open-function' });
    }
  }

  const subcategoryText = cellText(row.subcategory);
  if (subcategoryText) {
    const control = buildControl(subcategoryText, cellText(row.examples));
    if (!acc.currentCategory) {
      acc.dropped.push({
        rowIndex,
        level: 'subcategory',
        text: subcategoryText,
        reason: 'no-open-category'
      });
    } else if (acc.controlIds.has(control.id)) {
      acc.dropped.push({
        rowIndex,
        level: 'subcategory',
        text: subcategoryText,
        reason: 'duplicate-control-id'
      });
    } else {
      acc.currentCategory.controls.push(control);
      acc.controlIds.add(control.id);
    }
  }

  return acc;
}

/**
 * Rebuilds the Function -> Category -> Control tree from a flattened,
 * merged-cell table. A filled cell opens a node at its level; an empty cell
 * means the row still belongs to the most recently opened node. Rows whose
 * parent level is not open yet are dropped and reported in `dropped`.
 */
export function buildCatalog(
  rows: readonly CatalogRow[],
  options: CatalogBuildOptions = {}
): CatalogBuildResult {
  const groupIdStyle = options.groupIdStyle ?? 'abbreviation';
  const initial: CatalogAccumulator = {
    catalog: { functions: [] },
    currentFunction: null,
    currentCategory: null,
    controlIds: new Set(),
    dropped: []
  };

  const result = rows.reduce<CatalogAccumulator>(
    (acc, row, rowIndex) => applyRow(acc, row, rowIndex, groupIdStyle),
    initial
  );

  return { catalog: result.catalog, dropped: result.dropped };
}

export function listCatalogControls(catalog: Catalog): CatalogControl[] {
  return catalog.functions.flatMap((fn) => fn.categories.flatMap((category) => category.controls));
}

export function countCatalogNodes(catalog: Catalog): number {
  return catalog.functions.reduce(
    (total, fn) =>
      total +
      1 +
      fn.categories.reduce((subtotal, category) => subtotal + 1 + category.controls.length, 0),
    0
  );
}
