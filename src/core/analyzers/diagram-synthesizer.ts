/**
 * Diagram Synthesizer
 *
 * Diagrams are built as node/edge data first; mermaid source is
 * generated from that data with sanitized ids and escaped labels.
 */

import { DecisionCategory, Diagram, DiagramEdge, DiagramNode } from '../../types.js';
import { ReconciledDecision } from '../reconciler.js';
import type { FailureFlag } from './index.js';

export interface DiagramArtifact extends FailureFlag {
  diagrams: Diagram[];
}

export type DiagramKind = Diagram['kind'];

export const DIAGRAM_KINDS: DiagramKind[] = ['system-context', 'technology-stack'];

type Layer = 'application' | 'api' | 'data' | 'messaging' | 'platform';

const LAYER_OF: Partial<Record<DecisionCategory, Layer>> = {
  framework: 'application',
  'api-style': 'api',
  auth: 'api',
  database: 'data',
  orm: 'data',
  caching: 'data',
  messaging: 'messaging',
  infrastructure: 'platform',
  ci: 'platform',
};

const LAYER_TITLES: Record<Layer, string> = {
  application: 'Application',
  api: 'API',
  data: 'Data',
  messaging: 'Messaging',
  platform: 'Platform',
};

const SHAPE_OF: Partial<Record<DecisionCategory, DiagramNode['shape']>> = {
  database: 'database',
  caching: 'database',
  messaging: 'queue',
};

export function synthesizeDiagrams(decisions: ReconciledDecision[]): DiagramArtifact {
  return { diagrams: DIAGRAM_KINDS.map((kind) => synthesizeDiagram(kind, decisions)) };
}

export function synthesizeDiagram(kind: DiagramKind, decisions: ReconciledDecision[]): Diagram {
  const active = decisions.filter((d) => d.record.status !== 'REMOVED').map((d) => d.record);
  const { nodes, edges, title, technologies } =
    kind === 'system-context' ? systemContext(active) : technologyStack(active);

  return {
    id: kind,
    title,
    kind,
    nodes,
    edges,
    mermaid: toMermaid(kind === 'system-context' ? 'LR' : 'TD', nodes, edges),
    technologies,
  };
}

interface Graph {
  title: string;
  nodes: DiagramNode[];
  edges: DiagramEdge[];
  // Names of the detected technologies drawn in the graph
  technologies: string[];
}

type TechRecord = ReconciledDecision['record'];

function systemContext(records: TechRecord[]): Graph {
  const nodes: DiagramNode[] = [{ id: 'user', label: 'User', group: 'external', shape: 'round' }];
  const byLayer = new Map<Layer, DiagramNode[]>();
  const technologies: string[] = [];

  for (const record of records) {
    const layer = LAYER_OF[record.category];
    if (!layer) continue;
    technologies.push(record.technologyName);
    const node: DiagramNode = {
      id: sanitizeId(record.technologyId),
      label: record.technologyName,
      group: layer,
      shape: SHAPE_OF[record.category] ?? 'box',
    };
    nodes.push(node);
    byLayer.set(layer, [...(byLayer.get(layer) ?? []), node]);
  }

  let application = byLayer.get('application') ?? [];
  if (application.length === 0) {
    const app: DiagramNode = { id: 'app', label: 'Application', group: 'application', shape: 'box' };
    nodes.push(app);
    application = [app];
  }

  const edges: DiagramEdge[] = [];
  const entry = byLayer.get('api') ?? application;
  for (const target of entry) {
    edges.push({ from: 'user', to: target.id, label: 'requests' });
  }
  if (entry !== application) {
    for (const api of entry) {
      for (const app of application) edges.push({ from: api.id, to: app.id });
    }
  }
  for (const app of application) {
    for (const data of byLayer.get('data') ?? []) edges.push({ from: app.id, to: data.id, label: 'reads/writes' });
    for (const queue of byLayer.get('messaging') ?? []) edges.push({ from: app.id, to: queue.id, label: 'publishes' });
  }
  for (const platform of byLayer.get('platform') ?? []) {
    for (const app of application) edges.push({ from: platform.id, to: app.id, label: 'runs' });
  }

  return { title: 'System context', nodes, edges, technologies };
}

function technologyStack(records: TechRecord[]): Graph {
  const nodes: DiagramNode[] = [{ id: 'system', label: 'System', group: 'external', shape: 'round' }];
  const edges: DiagramEdge[] = [];
  const technologies: string[] = [];

  for (const category of DecisionCategory.options) {
    const inCategory = records.filter((r) => r.category === category);
    if (inCategory.length === 0) continue;

    const categoryId = sanitizeId(`category_${category}`);
    nodes.push({ id: categoryId, label: category, group: 'category', shape: 'box' });
    edges.push({ from: 'system', to: categoryId });

    for (const record of inCategory) {
      const id = sanitizeId(record.technologyId);
      technologies.push(record.technologyName);
      nodes.push({ id, label: record.technologyName, group: category, shape: SHAPE_OF[category] ?? 'box' });
      edges.push({ from: categoryId, to: id });
    }
  }

  return { title: 'Technology stack', nodes, edges, technologies };
}

/**
 * Mermaid source from node/edge data. Nodes sharing a layer are wrapped
 * in a subgraph.
 */
export function toMermaid(direction: 'LR' | 'TD', nodes: DiagramNode[], edges: DiagramEdge[]): string {
  const lines = [`graph ${direction}`];
  const groups = new Map<string, DiagramNode[]>();
  for (const node of nodes) {
    groups.set(node.group, [...(groups.get(node.group) ?? []), node]);
  }

  for (const [group, members] of groups) {
    const layerTitle = isLayer(group) ? LAYER_TITLES[group] : null;
    if (layerTitle) {
      lines.push(`  subgraph ${sanitizeId(`layer_${group}`)}["${escapeLabel(layerTitle)}"]`);
      for (const node of members) lines.push(`    ${renderNode(node)}`);
      lines.push('  end');
    } else {
      for (const node of members) lines.push(`  ${renderNode(node)}`);
    }
  }

  for (const edge of edges) {
    const arrow = edge.label ? `-->|"${escapeLabel(edge.label)}"|` : '-->';
    lines.push(`  ${sanitizeId(edge.from)} ${arrow} ${sanitizeId(edge.to)}`);
  }

  return lines.join('\n');
}

export function sanitizeId(raw: string): string {
  const id = raw.replace(/[^A-Za-z0-9_]/g, '_');
  return /^[A-Za-z_]/.test(id) ? id : `n_${id}`;
}

export function escapeLabel(label: string): string {
  return label
    .replace(/&/g, '#amp;')
    .replace(/"/g, '#quot;')
    .replace(/</g, '#lt;')
    .replace(/>/g, '#gt;')
    .replace(/[\r\n]+/g, ' ');
}

function renderNode(node: DiagramNode): string {
  const id = sanitizeId(node.id);
  const label = `"${escapeLabel(node.label)}"`;
  switch (node.shape) {
    case 'database':
      return `${id}[(${label})]`;
    case 'queue':
      return `${id}>${label}]`;
    case 'round':
      return `${id}(${label})`;
    default:
      return `${id}[${label}]`;
  }
}

function isLayer(group: string): group is Layer {
  return Object.hasOwn(LAYER_TITLES, group);
}
