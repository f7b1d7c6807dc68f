/**
 * Event Service
 *
 * Keeps the list of sales events and which one new sales are recorded
 * against. Events are never edited or deleted.
 */

import { v4 as uuid } from 'uuid';

import { config } from '../../config';
import { createServiceLogger } from '../../observability';
import { BlobStore, decodeEvents, encodeEvents, persistBlob } from '../../storage';
import { SalesEvent } from '../../types/sales';

const log = createServiceLogger('events');

export class EventService {
  private events: SalesEvent[] = [];
  private selectedId: string | null = null;

  constructor(
    private readonly store: BlobStore,
    private readonly blobKey: string = config.storage.keys.events
  ) {}

  async load(): Promise<void> {
    const raw = await this.store.get(this.blobKey);
    const decoded = raw === null ? null : decodeEvents(raw);

    if (raw !== null && decoded === null) {
      log.warn({ blob: this.blobKey }, 'Events blob could not be decoded; starting fresh');
    }

    this.events = decoded?.events ?? [];
    this.selectedId = decoded?.selectedId ?? null;
    log.info({ events: this.events.length, selectedId: this.selectedId }, 'Events loaded');
  }

  async save(): Promise<boolean> {
    const encoded = encodeEvents({ events: this.events, selectedId: this.selectedId });
    return persistBlob(this.store, this.blobKey, (store) => store.put(this.blobKey, encoded));
  }

  listEvents(): readonly SalesEvent[] {
    return this.events;
  }

  findEvent(id: string): SalesEvent | undefined {
    return this.events.find((event) => event.id === id);
  }

  /**
   * Display name for an event id, or an empty string when it does not resolve
   */
  eventName(id: string): string {
    return this.findEvent(id)?.name ?? '';
  }

  getSelectedId(): string | null {
    return this.selectedId;
  }

  getSelectedEvent(): SalesEvent | null {
    return this.selectedId === null ? null : this.findEvent(this.selectedId) ?? null;
  }

  /**
   * Create an event and make it the selected one
   */
  async addEvent(name: string): Promise<SalesEvent> {
    const event: SalesEvent = { id: uuid(), name };
    this.events.push(event);
    this.selectedId = event.id;
    log.info({ eventId: event.id, name }, 'Event added');
    await this.save();
    return event;
  }

  /**
   * Select a known event. Resolves false, without changes, for an unknown id.
   */
  async selectEvent(id: string): Promise<boolean> {
    if (!this.findEvent(id)) {
      return false;
    }
    this.selectedId = id;
    await this.save();
    return true;
  }
}
