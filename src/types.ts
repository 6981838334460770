export const NODE_TYPES = [
  'receptor',
  'hormone',
  'complex',
  'adapter',
  'repressor',
  'transporter',
  'transcription_factor',
  'process',
] as const;

export const NODE_CLASSES = ['macromolecule', 'biological_activity'] as const;

export const EDGE_CLASSES = [
  'positive_influence',
  'negative_influence',
  'logic_arc',
  'necessary_stimulation',
] as const;

export const CONFIDENCE_LEVELS = ['high', 'medium', 'low'] as const;

export type NodeType = typeof NODE_TYPES[number];
export type NodeClass = typeof NODE_CLASSES[number];
export type EdgeClass = typeof EDGE_CLASSES[number];
export type Confidence = typeof CONFIDENCE_LEVELS[number];

// Raw rows keyed by canonical column name, exactly as read from the CSV tables
export interface NodeRow {
  Nodes: string;
  Type: string;
  Class: string;
  compartmentRef: string;
}

export interface EdgeRow {
  source: string;
  target: string;
  Class: string;
  Confidence: string;
  Papers: string;
  Notes: string;
}

export type NetworkTables = {
  nodes: NodeRow[];
  edges: EdgeRow[];
};

export interface NetworkNode {
  label: string;
  type: NodeType;
  class: NodeClass;
  compartment: string;
}

export interface NetworkEdge {
  source: string;
  target: string;
  class: EdgeClass;
  confidence: Confidence;
  papers: readonly string[];
  notes: string;
}

export interface RegulatoryGraph {
  readonly nodes: readonly NetworkNode[];
  readonly edges: readonly NetworkEdge[];
  readonly nodeIndex: ReadonlyMap<string, NetworkNode>;
  readonly traitNode: NetworkNode;
}

export type Point = {
  x: number;
  y: number;
};

export type IdMap = Map<string, string>;
export type Layout = Map<string, Point>;

export interface BundleMetadata {
  n_nodes: number;
  n_edges: number;
  id_map_sample: Record<string, string>;
}

export interface Advisory {
  target: string;
  logicArcs: number;
  netEffectEdges: number;
  message: string;
}
