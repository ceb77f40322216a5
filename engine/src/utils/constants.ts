/** Shared constants for layout, geometry and timing magic numbers. */

/** Default flowchart node width for grid-placed nodes. */
export const NODE_WIDTH = 160;

/** Default flowchart node height for grid-placed nodes. */
export const NODE_HEIGHT = 60;

/** Horizontal pitch between grid columns. */
export const NODE_SPACING_X = 220;

/** Vertical pitch between grid rows. */
export const NODE_SPACING_Y = 120;

/** Columns per row for top-down grid placement. */
export const GRID_COLUMNS = 4;

/** Smallest width or height a resize may produce. */
export const MIN_NODE_SIZE = 50;

/** Padding around a label when a node is sized to fit its content. */
export const FIT_PADDING = 16;

/** Floor for content-fitted node sizes. */
export const FIT_MIN_WIDTH = 80;
export const FIT_MIN_HEIGHT = 48;

/** Pitch of the snap grid used by layout normalization. */
export const SNAP_GRID = 20;

/** Distance under which two points are treated as the same point. */
export const POINT_TOLERANCE = 0.1;

/** Bézier synthesis: minimum tangent offset and fixed normal offset. */
export const BEZIER_MIN_ALONG = 40;
export const BEZIER_ALONG_RATIO = 0.25;
export const BEZIER_NORMAL = 40;

/** Sequence diagram layout. */
export const PARTICIPANT_SPACING = 220;
export const PARTICIPANT_WIDTH = 140;
export const PARTICIPANT_HEADER_HEIGHT = 42;
export const LIFELINE_HEIGHT = 1000;
export const MESSAGE_BASE_Y = 120;
export const MESSAGE_STEP_Y = 70;
export const MESSAGE_LABEL_OFFSET = 14;
export const NOTE_GAP_Y = 50;
export const NOTE_STEP_Y = 80;
export const NOTE_MIN_WIDTH = 120;
export const NOTE_SPAN_PADDING = 140;
export const NOTE_TEXT_PADDING = 14;
export const TITLE_Y = 8;

/** Approximate glyph metrics used to size labels without a font engine. */
export const CHAR_WIDTH = 7;
export const LINE_HEIGHT = 18;

/** Default theme colours. */
export const DEFAULT_NODE_COLOR = '#dcddff';
export const DEFAULT_BORDER_COLOR = '#6464c8';
export const DEFAULT_STROKE_WIDTH = 2;

/** Debounce delay between the last text edit and the re-render. */
export const RENDER_DEBOUNCE_MS = 800;
