export type NetworkErrorCode =
  | 'SCHEMA'
  | 'TRAIT_CARDINALITY'
  | 'CLASS_CONSISTENCY'
  | 'DANGLING_REFERENCE'
  | 'CONFIG';

export class NetworkError extends Error {
  readonly code: NetworkErrorCode;

  constructor(code: NetworkErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

function formatValues(values: readonly string[]): string {
  return values.map(v => JSON.stringify(v)).join(', ');
}

/**
 * Missing column, or a cell outside its enumeration.
 */
export class SchemaError extends NetworkError {
  readonly table: 'nodes' | 'edges';
  readonly column: string;
  readonly values: string[];

  constructor(table: 'nodes' | 'edges', column: string, values: string[], detail: string) {
    super('SCHEMA', `${table}.csv ${detail} (column ${column}): ${formatValues(values)}`);
    this.table = table;
    this.column = column;
    this.values = values;
  }
}

export class TraitCardinalityError extends NetworkError {
  readonly processLabels: string[];

  constructor(processLabels: string[]) {
    const found = processLabels.length === 0 ? 'none' : formatValues(processLabels);
    super('TRAIT_CARDINALITY', `nodes.csv must contain exactly one node with Type=process; found ${processLabels.length} (${found})`);
    this.processLabels = processLabels;
  }
}

export class ClassConsistencyError extends NetworkError {
  readonly labels: string[];

  constructor(labels: string[]) {
    super('CLASS_CONSISTENCY', `nodes.csv non-process nodes must have Class=macromolecule: ${formatValues(labels)}`);
    this.labels = labels;
  }
}

export class DanglingReferenceError extends NetworkError {
  readonly unknownSources: string[];
  readonly unknownTargets: string[];

  constructor(unknownSources: string[], unknownTargets: string[]) {
    super(
      'DANGLING_REFERENCE',
      `Edges reference unknown nodes:\n sources=[${formatValues(unknownSources)}]\n targets=[${formatValues(unknownTargets)}]`
    );
    this.unknownSources = unknownSources;
    this.unknownTargets = unknownTargets;
  }
}

export class ConfigError extends NetworkError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}
