export type {
  Direction,
  EdgeType,
  EdgeStyle,
  MessageStyle,
  ConfigValue,
  DiagramConfig,
  DiagramNode,
  DiagramEdge,
  ClassDef,
  FlowchartDiagram,
  SequenceParticipant,
  SequenceMessage,
  SequenceNote,
  SequenceDiagram,
  Diagram,
} from './models/diagram.js';
export type { Point, Rect, Vec2, NodeGeometry, EdgeGeometry, PositionState } from './models/geometry.js';
export type {
  SceneItemKind,
  ResizeHandle,
  NodeStyle,
  NodePrimitive,
  ArrowHead,
  EdgePrimitive,
  ParticipantPrimitive,
  MessagePrimitive,
  NotePrimitive,
  TitlePrimitive,
  ScenePrimitive,
  SceneItemBase,
  DisplaySurface,
  GeometryChange,
  GeometryListener,
} from './models/scene.js';
export { RESIZE_HANDLES } from './models/scene.js';

export { parseDiagram, significantLines } from './parser/diagramParser.js';
export { parseFlowchart, parseCssProperties } from './parser/flowchartParser.js';
export { parseSequence, messageStyle } from './parser/sequenceParser.js';

export {
  PositionStore,
  FilePositionBackend,
  MemoryPositionBackend,
  readPositionState,
  toPositionRecords,
  type PositionBackend,
  type PositionStoreOptions,
  type EdgeGeometryPatch,
  type PositionRecords,
} from './services/positionStore.js';
export {
  DiagramRenderer,
  DEFAULT_SETTINGS,
  gridPosition,
  type RendererSettings,
  type RenderMode,
  type DiagramRendererOptions,
} from './services/diagramRenderer.js';
export { DiagramEngine, type RenderResult, type DiagramEngineOptions } from './services/diagramEngine.js';
export { RenderScheduler, type RenderTask } from './services/renderScheduler.js';
export {
  saveDiagramFile,
  loadDiagramFile,
  serializeDiagramFile,
  parseDiagramFile,
  type DiagramDocument,
} from './services/diagramFile.js';

export { capabilitiesOf } from './graphics/capabilities.js';
export type {
  Selectable,
  Draggable,
  GeometryOwner,
  GeometryDependent,
  ItemCapabilities,
  GraphicsContext,
  NodeLookup,
  ParticipantLookup,
} from './graphics/capabilities.js';
export { InteractiveNode, resolveNodeStyle, type ThemeColors } from './graphics/interactiveNode.js';
export { InteractiveEdge, type EdgeHandle } from './graphics/interactiveEdge.js';
export { NodeDragSession } from './graphics/nodeDragSession.js';
export { Participant, Message, Note, Title } from './graphics/sequenceItems.js';
export { MemorySurface } from './scene/memorySurface.js';

export { extractConfigBlock, ensureFixedLayoutConfig, removeConfigBlock, type ConfigBlock } from './utils/configBlock.js';
export { edgeKey, edgeKeyOf, hasAmbiguousKeyPart, EDGE_KEY_SEPARATOR } from './utils/edgeKey.js';
export { connectionPoint, isOnBoundary, cubicPoint, angleDegrees } from './utils/geometry.js';
export { DiagramLogger, MemoryLogSink, type LogSink, type LogLevel, type LogEntry } from './utils/logger.js';
export { DiagramError, DiagramFileError, errorMessage } from './utils/errors.js';
export { resolveEngineConfig, DEFAULT_POSITIONS_PATH, type EngineConfig } from './utils/engineConfig.js';
