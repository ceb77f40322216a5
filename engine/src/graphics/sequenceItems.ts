/** Sequence diagram items: participants own geometry, messages and notes follow them. */

import type { MessageStyle } from '../models/diagram.js';
import type { Point, Rect } from '../models/geometry.js';
import type {
  MessagePrimitive,
  NotePrimitive,
  ParticipantPrimitive,
  SceneItemBase,
  TitlePrimitive,
} from '../models/scene.js';
import {
  LIFELINE_HEIGHT,
  MESSAGE_LABEL_OFFSET,
  NOTE_MIN_WIDTH,
  NOTE_SPAN_PADDING,
  NOTE_TEXT_PADDING,
  PARTICIPANT_HEADER_HEIGHT,
  PARTICIPANT_WIDTH,
} from '../utils/constants.js';
import { errorMessage } from '../utils/errors.js';
import { measureText } from '../utils/textMeasure.js';
import type { Draggable, GeometryDependent, GeometryOwner, GraphicsContext } from './capabilities.js';

export interface ParticipantOptions {
  participantId: string;
  label: string;
  x: number;
  width?: number;
  headerHeight?: number;
  lifelineHeight?: number;
}

/** Header box plus lifeline. Moves along x only. */
export class Participant implements SceneItemBase, Draggable, GeometryOwner {
  readonly kind = 'participant';
  readonly id: string;
  readonly participantId: string;
  label: string;
  readonly headerHeight: number;
  readonly lifelineHeight: number;
  private _x: number;
  private _width: number;
  private readonly dependents: GeometryDependent[] = [];
  private readonly ctx: GraphicsContext;

  constructor(options: ParticipantOptions, ctx: GraphicsContext) {
    this.participantId = options.participantId;
    this.id = `participant:${options.participantId}`;
    this.label = options.label;
    this._x = options.x;
    this._width = options.width ?? PARTICIPANT_WIDTH;
    this.headerHeight = options.headerHeight ?? PARTICIPANT_HEADER_HEIGHT;
    this.lifelineHeight = options.lifelineHeight ?? LIFELINE_HEIGHT;
    this.ctx = ctx;
  }

  get x(): number {
    return this._x;
  }

  get width(): number {
    return this._width;
  }

  setWidth(width: number): void {
    this._width = width;
    this.notifyDependents();
  }

  centerX(): number {
    return this._x + this.width / 2;
  }

  /** The vertical component of a drag is discarded. */
  moveBy(dx: number, _dy: number): void {
    this.moveTo(this._x + dx);
  }

  moveTo(x: number): void {
    this._x = x;
    this.notifyDependents();
  }

  release(): void {
    this.persistGeometry();
  }

  persistGeometry(): void {
    this.ctx.store.setNodeGeometry(this.participantId, this._x, 0, this.width, this.headerHeight);
    this.ctx.geometryChanged({ id: this.participantId, x: this._x, y: 0, width: this.width, height: this.headerHeight });
  }

  addDependent(dependent: GeometryDependent): void {
    if (!this.dependents.includes(dependent)) this.dependents.push(dependent);
  }

  removeDependent(dependent: GeometryDependent): void {
    const index = this.dependents.indexOf(dependent);
    if (index !== -1) this.dependents.splice(index, 1);
  }

  notifyDependents(): void {
    for (const dependent of this.dependents) {
      try {
        dependent.updateGeometry();
      } catch (err) {
        this.ctx.logger.error('Dependent update failed', { participant: this.participantId, dependent: dependent.id, error: errorMessage(err) });
      }
    }
  }

  bounds(): Rect {
    return { x: this._x, y: 0, width: this.width, height: this.lifelineHeight };
  }

  describe(): ParticipantPrimitive {
    return {
      kind: 'participant',
      id: this.id,
      participantId: this.participantId,
      label: this.label,
      header: { x: this._x, y: 0, width: this.width, height: this.headerHeight },
      lifeline: { x: this.centerX(), top: this.headerHeight, bottom: this.lifelineHeight },
    };
  }
}

/** Horizontal arrow between two lifelines at a fixed y. */
export class Message implements SceneItemBase, GeometryDependent {
  readonly kind = 'message';
  readonly id: string;
  readonly text: string;
  readonly style: MessageStyle;
  readonly y: number;
  private readonly sourceItem: Participant;
  private readonly targetItem: Participant;
  private rect: Rect = { x: 0, y: 0, width: 0, height: 0 };

  constructor(id: string, source: Participant, target: Participant, text: string, style: MessageStyle, y: number) {
    this.id = id;
    this.sourceItem = source;
    this.targetItem = target;
    this.text = text;
    this.style = style;
    this.y = y;
    source.addDependent(this);
    target.addDependent(this);
    this.updateGeometry();
  }

  updateGeometry(): void {
    const x1 = Math.min(this.sourceItem.centerX(), this.targetItem.centerX());
    const x2 = Math.max(this.sourceItem.centerX(), this.targetItem.centerX());
    this.rect = { x: x1 - 40, y: this.y - 30, width: x2 - x1 + 80, height: 60 };
  }

  detach(): void {
    this.sourceItem.removeDependent(this);
    this.targetItem.removeDependent(this);
  }

  from(): Point {
    return { x: this.sourceItem.centerX(), y: this.y };
  }

  to(): Point {
    return { x: this.targetItem.centerX(), y: this.y };
  }

  bounds(): Rect {
    return { ...this.rect };
  }

  describe(): MessagePrimitive {
    const from = this.from();
    const to = this.to();
    return {
      kind: 'message',
      id: this.id,
      source: this.sourceItem.participantId,
      target: this.targetItem.participantId,
      text: this.text,
      style: this.style,
      from,
      to,
      arrow: { at: { ...to }, angle: to.x >= from.x ? 0 : 180 },
      labelPosition: { x: (from.x + to.x) / 2, y: this.y - MESSAGE_LABEL_OFFSET },
    };
  }
}

/** Box spanning the lifelines of its participants. */
export class Note implements SceneItemBase, GeometryDependent {
  readonly kind = 'note';
  readonly id: string;
  readonly text: string;
  readonly y: number;
  private readonly participants: Participant[];
  private rect: Rect = { x: 0, y: 0, width: 0, height: 0 };

  constructor(id: string, participants: Participant[], text: string, y: number) {
    this.id = id;
    this.participants = participants;
    this.text = text;
    this.y = y;
    for (const p of participants) p.addDependent(this);
    this.updateGeometry();
  }

  private xSpan(): [number, number] {
    const xs = this.participants.map((p) => p.centerX());
    if (xs.length === 0) return [0, 0];
    return [Math.min(...xs), Math.max(...xs)];
  }

  updateGeometry(): void {
    const [x1, x2] = this.xSpan();
    const width = Math.max(NOTE_MIN_WIDTH, x2 - x1 + NOTE_SPAN_PADDING);
    const height = measureText(this.text).height + NOTE_TEXT_PADDING;
    this.rect = { x: (x1 + x2) / 2 - width / 2, y: this.y, width, height };
  }

  detach(): void {
    for (const p of this.participants) p.removeDependent(this);
  }

  bounds(): Rect {
    return { ...this.rect };
  }

  describe(): NotePrimitive {
    return {
      kind: 'note',
      id: this.id,
      participants: this.participants.map((p) => p.participantId),
      text: this.text,
      rect: this.bounds(),
    };
  }
}

export class Title implements SceneItemBase {
  readonly kind = 'title';
  readonly id = 'title';
  text: string;
  private anchor: Point;

  constructor(text: string, anchor: Point) {
    this.text = text;
    this.anchor = { ...anchor };
  }

  update(text: string, anchor: Point): void {
    this.text = text;
    this.anchor = { ...anchor };
  }

  bounds(): Rect {
    const size = measureText(this.text);
    return { x: this.anchor.x - size.width / 2, y: this.anchor.y, width: size.width, height: size.height };
  }

  describe(): TitlePrimitive {
    return { kind: 'title', id: this.id, text: this.text, anchor: { ...this.anchor } };
  }
}
