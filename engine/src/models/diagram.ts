/** Parsed diagram description: what the text says, with no geometry or prior state. */

export type Direction = 'TD' | 'TB' | 'BT' | 'RL' | 'LR';

export type EdgeType = 'arrow' | 'bidirectional';

/** Line style of a flowchart edge. Not part of edge identity. */
export type EdgeStyle = 'solid' | 'dotted' | 'thick';

export type MessageStyle = 'solid' | 'dashed' | 'async';

export type ConfigValue = string | number | boolean;

/** Leading `---` block of a diagram. Keys other than the known ones pass through untouched. */
export interface DiagramConfig {
  layout?: 'fixed' | 'auto';
  participant_spacing?: number;
  [key: string]: ConfigValue | undefined;
}

export interface DiagramNode {
  id: string;
  label: string;
  type: 'rect';
  properties: Record<string, string>;
  cssClass?: string;
}

export interface DiagramEdge {
  source: string;
  target: string;
  label: string;
  edgeType: EdgeType;
  style: EdgeStyle;
}

/** Named style bundle (fill, stroke, stroke-width, ...). */
export type ClassDef = Record<string, string>;

export interface FlowchartDiagram {
  type: 'flowchart';
  direction: Direction;
  nodes: DiagramNode[];
  edges: DiagramEdge[];
  classDefs: Record<string, ClassDef>;
  config: DiagramConfig;
}

export interface SequenceParticipant {
  id: string;
  label: string;
}

export interface SequenceMessage {
  source: string;
  target: string;
  text: string;
  style: MessageStyle;
}

export interface SequenceNote {
  participants: string[];
  text: string;
}

export interface SequenceDiagram {
  type: 'sequence';
  title: string;
  participants: SequenceParticipant[];
  messages: SequenceMessage[];
  notes: SequenceNote[];
  config: DiagramConfig;
}

export type Diagram = FlowchartDiagram | SequenceDiagram;
