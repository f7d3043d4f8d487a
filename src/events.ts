// Event registry: per-element listener lists and the event queue
// Listeners are plain functions; registrations are identified by ListenerId.

import type { Document } from './document.ts';
import type { Element, ElementHandle } from './element.ts';
import { ensureError } from './errors.ts';
import { getLogger } from './logging.ts';

const logger = getLogger('Events');

export type EventType =
  | 'focus'
  | 'blur'
  | 'resize'
  | 'keydown'
  | 'keyup'
  | 'keypress'
  | 'mouseenter'
  | 'mouseleave'
  | 'mousemove'
  | 'mousedown'
  | 'mouseup'
  | 'click'
  | 'dblclick'
  | 'contextmenu'
  | 'wheel';

export const EVENT_TYPES: readonly EventType[] = [
  'focus', 'blur', 'resize',
  'keydown', 'keyup', 'keypress',
  'mouseenter', 'mouseleave', 'mousemove', 'mousedown', 'mouseup',
  'click', 'dblclick', 'contextmenu', 'wheel',
];

export interface BaseEvent {
  type: EventType;
  target: ElementHandle;
  timestamp: number;
}

export interface KeyEvent extends BaseEvent {
  type: 'keypress' | 'keydown' | 'keyup';
  key: string;
  code: string;
  ctrlKey: boolean;
  altKey: boolean;
  shiftKey: boolean;
  metaKey: boolean;
}

export interface MouseEvent extends BaseEvent {
  type: 'mouseenter' | 'mouseleave' | 'mousemove' | 'mousedown' | 'mouseup' | 'click' | 'dblclick' | 'contextmenu';
  x: number;
  y: number;
  button: number; // 0=left, 1=middle, 2=right
  buttons: number; // Bitmask of pressed buttons
}

export interface WheelEvent extends BaseEvent {
  type: 'wheel';
  x: number;
  y: number;
  deltaX: number;
  deltaY: number; // positive = scroll down
  deltaZ: number;
}

export interface FocusEvent extends BaseEvent {
  type: 'focus' | 'blur';
  relatedTarget?: ElementHandle;
}

export interface ResizeEvent extends BaseEvent {
  type: 'resize';
  width: number;
  height: number;
}

export type QuireEvent = KeyEvent | MouseEvent | WheelEvent | FocusEvent | ResizeEvent;

export type EventHandler = (event: QuireEvent, element: Element) => void;

/** Opaque registration id returned by addListener */
export type ListenerId = number;

interface ListenerRegistration {
  id: ListenerId;
  handler: EventHandler;
}

let nextListenerId = 1;

/**
 * Listener lists of one element, keyed by event type.
 */
export class ListenerTable {
  private _lists = new Map<EventType, ListenerRegistration[]>();

  add(type: EventType, handler: EventHandler): ListenerId {
    const id = nextListenerId++;
    let list = this._lists.get(type);
    if (!list) {
      list = [];
      this._lists.set(type, list);
    }
    list.push({ id, handler });
    return id;
  }

  /**
   * Remove by id (that registration) or by handler (every registration of
   * the same function object). Returns the number removed.
   */
  remove(type: EventType, idOrHandler: ListenerId | EventHandler): number {
    const list = this._lists.get(type);
    if (!list) {
      return 0;
    }

    const kept = typeof idOrHandler === 'number'
      ? list.filter(reg => reg.id !== idOrHandler)
      : list.filter(reg => reg.handler !== idOrHandler);
    const removed = list.length - kept.length;

    if (kept.length === 0) {
      this._lists.delete(type);
    } else {
      this._lists.set(type, kept);
    }
    return removed;
  }

  listeners(type: EventType): EventHandler[] {
    return (this._lists.get(type) ?? []).map(reg => reg.handler);
  }

  count(type?: EventType): number {
    if (type) {
      return this._lists.get(type)?.length ?? 0;
    }
    let total = 0;
    for (const list of this._lists.values()) {
      total += list.length;
    }
    return total;
  }

  /**
   * Call the listeners registered for the event's type, in registration
   * order. The list is copied first: listeners added or removed during
   * dispatch take effect on the next event. A throwing listener is logged
   * and the remaining listeners still run. Once a listener destroys the
   * element, dispatch stops. Returns the number called.
   */
  dispatch(element: Element, event: QuireEvent): number {
    const snapshot = [...(this._lists.get(event.type) ?? [])];
    let called = 0;
    for (const reg of snapshot) {
      if (!element.alive) {
        break;
      }
      called++;
      try {
        reg.handler(event, element);
      } catch (error) {
        logger.error(`Error in ${event.type} listener`, ensureError(error), {
          element: element.toString(),
          listenerId: reg.id,
        });
      }
    }
    return called;
  }

  clear(): void {
    this._lists.clear();
  }
}

/**
 * FIFO of events addressed by element handle. The platform side enqueues;
 * processEvents() drains. Events whose target no longer exists are dropped.
 */
export class EventQueue {
  private _queue: QuireEvent[] = [];
  private _document: Document;

  constructor(document: Document) {
    this._document = document;
  }

  enqueue(event: QuireEvent): void {
    this._queue.push(event);
  }

  get pending(): number {
    return this._queue.length;
  }

  /**
   * Drain the queue, including events enqueued by listeners while draining.
   * Returns the number of events delivered.
   */
  processEvents(): number {
    let delivered = 0;
    let event = this._queue.shift();
    while (event) {
      const target = this._document.getElement(event.target);
      if (target) {
        target.dispatch(event);
        delivered++;
      } else {
        logger.debug('Dropping event for missing target', { type: event.type, target: event.target });
      }
      event = this._queue.shift();
    }
    return delivered;
  }

  clear(): void {
    this._queue = [];
  }
}

// Event creation helpers

export function createKeyEvent(
  type: 'keypress' | 'keydown' | 'keyup',
  target: ElementHandle,
  key: string,
  code: string = key,
  modifiers: {
    ctrlKey?: boolean;
    altKey?: boolean;
    shiftKey?: boolean;
    metaKey?: boolean;
  } = {}
): KeyEvent {
  return {
    type,
    target,
    key,
    code,
    ctrlKey: modifiers.ctrlKey || false,
    altKey: modifiers.altKey || false,
    shiftKey: modifiers.shiftKey || false,
    metaKey: modifiers.metaKey || false,
    timestamp: Date.now(),
  };
}

export function createMouseEvent(
  type: MouseEvent['type'],
  target: ElementHandle,
  x: number,
  y: number,
  button: number = 0,
  buttons: number = 0
): MouseEvent {
  return { type, target, x, y, button, buttons, timestamp: Date.now() };
}

export function createWheelEvent(
  target: ElementHandle,
  x: number,
  y: number,
  deltaX: number,
  deltaY: number,
  deltaZ: number = 0
): WheelEvent {
  return { type: 'wheel', target, x, y, deltaX, deltaY, deltaZ, timestamp: Date.now() };
}

export function createFocusEvent(
  type: 'focus' | 'blur',
  target: ElementHandle,
  relatedTarget?: ElementHandle
): FocusEvent {
  return { type, target, relatedTarget, timestamp: Date.now() };
}

export function createResizeEvent(target: ElementHandle, width: number, height: number): ResizeEvent {
  return { type: 'resize', target, width, height, timestamp: Date.now() };
}
