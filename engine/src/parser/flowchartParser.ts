/** Flowchart parsing: direction and classes first, then edges and node declarations in source order. */

import type {
  ClassDef,
  DiagramConfig,
  DiagramEdge,
  DiagramNode,
  Direction,
  EdgeStyle,
  FlowchartDiagram,
} from '../models/diagram.js';
import type { LogSink } from '../utils/logger.js';

/** `A`, `A[Label]`, `A["Label"]`, `A(Label)` or `A{Label}`. */
const NODE_REF = String.raw`\w+(?:\[[^\]]*\]|\([^)]*\)|\{[^}]*\})?`;
const ARROW = String.raw`(-->|-\.->|==>)`;

const HEADER_RE = /^(?:flowchart|graph)\b(?:\s+(TD|TB|BT|RL|LR))?/i;
const DIRECTION_RE = /^direction\s+(TD|TB|BT|RL|LR)\s*$/i;
const CLASS_DEF_RE = /^classDef\s+(\w+)\s+(.+)$/;
const CLASS_STATEMENT_RE = /^class\s+([\w\s,]+?)\s+(\w+)$/;
const CLASS_ASSIGN_RE = new RegExp(String.raw`(\w+)(?:\[[^\]]*\]|\([^)]*\)|\{[^}]*\})?:::(\w+)`, 'g');
const CLASS_SUFFIX_RE = /:::\w+/g;
const IGNORED_STATEMENT_RE = /^(?:classDef|class|style|linkStyle|direction|subgraph|end)\b/;

const MULTI_EDGE_RE = new RegExp(String.raw`^(${NODE_REF})\s*${ARROW}\s*(.+&.+)$`);
const BIDIRECTIONAL_RE = new RegExp(String.raw`^(${NODE_REF})\s*<-->\s*(${NODE_REF})$`);
const LABELED_EDGE_RE = new RegExp(String.raw`^(${NODE_REF})\s*--\s*([^->\s][^-]*?)\s*-->\s*(${NODE_REF})$`);
const PIPE_LABEL_EDGE_RE = new RegExp(String.raw`^(${NODE_REF})\s*${ARROW}\s*\|([^|]*)\|\s*(${NODE_REF})$`);
const SIMPLE_EDGE_RE = new RegExp(String.raw`^(${NODE_REF})\s*${ARROW}\s*(${NODE_REF})$`);
const CHAIN_STEP = String.raw`\s*${ARROW}\s*(?:\|([^|]*)\|\s*)?(${NODE_REF})`;
const CHAIN_RE = new RegExp(
  String.raw`^(${NODE_REF})((?:\s*(?:-->|-\.->|==>)\s*(?:\|[^|]*\|\s*)?${NODE_REF}){2,})$`,
);
const CHAIN_STEP_RE = new RegExp(CHAIN_STEP, 'g');
const LEADING_EDGE_RE = new RegExp(String.raw`^(${NODE_REF})\s*${ARROW}\s*(${NODE_REF})(?=\s|$)`);
const QUOTED_NODE_RE = /^(\w+)\[\s*"([^"]*)"\s*\]$/;
const BRACKET_NODE_RE = /^(\w+)(?:\[([^\]]*)\]|\(([^)]*)\)|\{([^}]*)\})$/;
const SINGLE_REF_RE = new RegExp(String.raw`^${NODE_REF}$`);

interface NodeRef {
  id: string;
  label?: string;
}

const ARROW_STYLES: Record<string, EdgeStyle> = {
  '-->': 'solid',
  '-.->': 'dotted',
  '==>': 'thick',
};

function toDirection(raw: string): Direction {
  const upper = raw.toUpperCase();
  return upper === 'TB' || upper === 'BT' || upper === 'RL' || upper === 'LR' ? upper : 'TD';
}

/** Split `k:v, k:v` into a property map. */
export function parseCssProperties(raw: string): Record<string, string> {
  const properties: Array<[string, string]> = [];
  for (const part of raw.replace(/;\s*$/, '').split(',')) {
    const colon = part.indexOf(':');
    if (colon === -1) continue;
    const key = part.slice(0, colon).trim();
    if (key) properties.push([key, part.slice(colon + 1).trim()]);
  }
  return Object.fromEntries(properties);
}

function parseNodeRef(raw: string): NodeRef {
  const text = raw.trim();
  const quoted = text.match(QUOTED_NODE_RE);
  if (quoted) return { id: quoted[1], label: quoted[2] };
  const bracket = text.match(BRACKET_NODE_RE);
  if (bracket) {
    const label = (bracket[2] ?? bracket[3] ?? bracket[4] ?? '').trim().replace(/^"+|"+$/g, '');
    return { id: bracket[1], label };
  }
  return { id: text };
}

class FlowchartBuilder {
  readonly nodes = new Map<string, DiagramNode>();
  readonly edges: DiagramEdge[] = [];

  /** Record a mention. A label declares (or re-declares) the node; a bare id only creates it. */
  mention(ref: NodeRef): string {
    const existing = this.nodes.get(ref.id);
    if (existing) {
      if (ref.label !== undefined) existing.label = ref.label;
    } else {
      this.nodes.set(ref.id, { id: ref.id, label: ref.label ?? ref.id, type: 'rect', properties: {} });
    }
    return ref.id;
  }

  edge(source: NodeRef, target: NodeRef, options: { label?: string; edgeType?: 'arrow' | 'bidirectional'; style?: EdgeStyle } = {}): void {
    this.edges.push({
      source: this.mention(source),
      target: this.mention(target),
      label: options.label ?? '',
      edgeType: options.edgeType ?? 'arrow',
      style: options.style ?? 'solid',
    });
  }
}

export function parseFlowchart(lines: string[], config: DiagramConfig, logger?: LogSink): FlowchartDiagram {
  let direction: Direction = 'TD';
  const classDefs = new Map<string, ClassDef>();
  const nodeClasses = new Map<string, string>();

  // Pass 1: direction and classes, so they are known before any node exists.
  for (const line of lines) {
    const header = line.match(HEADER_RE);
    if (header) {
      if (header[1]) direction = toDirection(header[1]);
      continue;
    }
    const dir = line.match(DIRECTION_RE);
    if (dir) {
      direction = toDirection(dir[1]);
      continue;
    }
    const classDef = line.match(CLASS_DEF_RE);
    if (classDef) {
      classDefs.set(classDef[1], parseCssProperties(classDef[2]));
      continue;
    }
    const statement = line.match(CLASS_STATEMENT_RE);
    if (statement) {
      for (const id of statement[1].split(',').map((s) => s.trim()).filter(Boolean)) {
        nodeClasses.set(id, statement[2]);
      }
      continue;
    }
    for (const match of line.matchAll(CLASS_ASSIGN_RE)) {
      nodeClasses.set(match[1], match[2]);
    }
  }

  // Pass 2: structure, first match wins per line.
  const builder = new FlowchartBuilder();
  for (const rawLine of lines) {
    if (HEADER_RE.test(rawLine) || IGNORED_STATEMENT_RE.test(rawLine)) continue;
    const line = rawLine.replace(CLASS_SUFFIX_RE, '').replace(/;\s*$/, '').trim();
    if (!line) continue;

    const multi = line.match(MULTI_EDGE_RE);
    if (multi) {
      const source = parseNodeRef(multi[1]);
      const style = ARROW_STYLES[multi[2]] ?? 'solid';
      for (const part of multi[3].split('&').map((s) => s.trim())) {
        if (!SINGLE_REF_RE.test(part)) {
          logger?.debug('Skipped multi-edge target', { line, target: part });
          continue;
        }
        builder.edge(source, parseNodeRef(part), { style });
      }
      continue;
    }

    const chain = line.match(CHAIN_RE);
    if (chain) {
      // `A --> B --> C` is A->B then B->C.
      let source = parseNodeRef(chain[1]);
      for (const step of chain[2].matchAll(CHAIN_STEP_RE)) {
        const target = parseNodeRef(step[3]);
        builder.edge(source, target, { label: (step[2] ?? '').trim(), style: ARROW_STYLES[step[1]] ?? 'solid' });
        source = { id: target.id };
      }
      continue;
    }

    const bidirectional = line.match(BIDIRECTIONAL_RE);
    if (bidirectional) {
      builder.edge(parseNodeRef(bidirectional[1]), parseNodeRef(bidirectional[2]), { edgeType: 'bidirectional' });
      continue;
    }

    const labeled = line.match(LABELED_EDGE_RE);
    if (labeled) {
      builder.edge(parseNodeRef(labeled[1]), parseNodeRef(labeled[3]), { label: labeled[2].trim() });
      continue;
    }

    const piped = line.match(PIPE_LABEL_EDGE_RE);
    if (piped) {
      builder.edge(parseNodeRef(piped[1]), parseNodeRef(piped[4]), {
        label: piped[3].trim(),
        style: ARROW_STYLES[piped[2]] ?? 'solid',
      });
      continue;
    }

    const simple = line.match(SIMPLE_EDGE_RE);
    if (simple) {
      builder.edge(parseNodeRef(simple[1]), parseNodeRef(simple[3]), { style: ARROW_STYLES[simple[2]] ?? 'solid' });
      continue;
    }

    const quoted = line.match(QUOTED_NODE_RE);
    if (quoted) {
      builder.mention({ id: quoted[1], label: quoted[2] });
      continue;
    }

    if (BRACKET_NODE_RE.test(line)) {
      builder.mention(parseNodeRef(line));
      continue;
    }

    const leading = line.match(LEADING_EDGE_RE);
    if (leading) {
      builder.edge(parseNodeRef(leading[1]), parseNodeRef(leading[3]), { style: ARROW_STYLES[leading[2]] ?? 'solid' });
      logger?.debug('Ignored text after edge', { line, rest: line.slice(leading[0].length).trim() });
      continue;
    }

    logger?.debug('Skipped unrecognized line', { line });
  }

  for (const [id, cssClass] of nodeClasses) {
    const node = builder.nodes.get(id);
    if (node) node.cssClass = cssClass;
  }

  return {
    type: 'flowchart',
    direction,
    nodes: [...builder.nodes.values()],
    edges: builder.edges,
    classDefs: Object.fromEntries(classDefs),
    config,
  };
}
