import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { loadConfig } from './config';
import { NetworkError } from './errors';
import { writeBundle, type BundlePaths } from './network/bundle';
import { computeLayout } from './network/layout';
import { buildGraph, identifyNodes } from './network/pipeline';
import { renderSbgn } from './network/sbgn';

export type CliArgs = {
  nodes: string;
  edges: string;
  out: string;
  config?: string;
};

export const USAGE_FLAGS = '--nodes <nodes.csv> --edges <edges.csv> --out <path> [--config <network.config.yaml>]';

function readFlag(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  const value = args[index + 1];
  return value && !value.startsWith('--') ? value : undefined;
}

/**
 * Returns null when a required flag is missing.
 */
export function parseCliArgs(args: string[]): CliArgs | null {
  const nodes = readFlag(args, '--nodes');
  const edges = readFlag(args, '--edges');
  const out = readFlag(args, '--out');
  if (!nodes || !edges || !out) return null;
  return { nodes, edges, out, config: readFlag(args, '--config') };
}

export function reportFailure(err: unknown): void {
  if (err instanceof NetworkError) {
    console.error(`❌ ${err.name}: ${err.message}`);
  } else {
    console.error('❌ Failed:', err);
  }
}

export function runValidateAndPack(args: CliArgs): BundlePaths {
  const config = loadConfig(args.config);
  const graph = buildGraph(args.nodes, args.edges);
  const idMap = identifyNodes(graph, config.identifiers);
  const paths = writeBundle(graph, idMap, args.out, config.bundle);

  console.log(`📦 Bundle written to ${args.out}`);
  console.log(`   - ${paths.nodesPath}`);
  console.log(`   - ${paths.edgesPath}`);
  console.log(`   - ${paths.metaPath}`);
  return paths;
}

export function runSbgnFromCsv(args: CliArgs): string {
  const config = loadConfig(args.config);
  const graph = buildGraph(args.nodes, args.edges);
  const idMap = identifyNodes(graph, config.identifiers);
  const layout = computeLayout(graph.nodes, config.layout);
  const xml = renderSbgn(graph, config, idMap, layout);

  mkdirSync(dirname(args.out), { recursive: true });
  writeFileSync(args.out, xml, 'utf-8');
  console.log(`🗺️  SBGN written to ${args.out}`);
  return args.out;
}

/**
 * Parse argv, run the command and return the exit status:
 * 0 on success, 1 on a usage error or any failure.
 */
export function runCommand(name: string, argv: string[], run: (args: CliArgs) => unknown): number {
  const args = parseCliArgs(argv);
  if (!args) {
    console.error(`Usage: ${name} ${USAGE_FLAGS}`);
    return 1;
  }

  try {
    run(args);
    return 0;
  } catch (err) {
    reportFailure(err);
    return 1;
  }
}
