/**
 * =============================================================================
 * ROUTE GUIDE MODULE - NOTE REGISTRY
 * =============================================================================
 *
 * Notes left at exact locations, shared by every RouteChat call.
 *
 * CONCURRENCY:
 * ─────────────────────────────
 * append() is fully synchronous: push + copy happen in one turn of the event
 * loop, so appends to the same key are linearized and none is lost, while
 * appends to different keys touch different lists and never wait on each
 * other. The returned array is a copy taken inside that turn; callers stream
 * it out afterwards without blocking anyone.
 *
 * Lists are append-only. Nothing is ever removed or rewritten.
 * =============================================================================
 */

import { Point, RouteNote } from '../../shared/types/api.types';
import { pointKey } from '../../shared/utils/geospatial.utils';

export class NoteRegistry {
  private readonly notesByLocation = new Map<string, RouteNote[]>();
  private totalNotes = 0;

  /**
   * Number of distinct locations holding at least one note
   */
  get locationCount(): number {
    return this.notesByLocation.size;
  }

  get noteCount(): number {
    return this.totalNotes;
  }

  /**
   * Append a note at `point` and return a snapshot of every note stored there,
   * the new one last
   */
  append(point: Point, note: RouteNote): RouteNote[] {
    const key = pointKey(point);

    let notes = this.notesByLocation.get(key);
    if (!notes) {
      notes = [];
      this.notesByLocation.set(key, notes);
    }

    notes.push(freezeNote(note));
    this.totalNotes++;

    return notes.slice();
  }

  /**
   * Snapshot of the notes at `point` (empty if none)
   */
  history(point: Point): RouteNote[] {
    return this.notesByLocation.get(pointKey(point))?.slice() ?? [];
  }
}

/**
 * Frozen private copy of a note
 */
function freezeNote(note: RouteNote): RouteNote {
  return Object.freeze({
    location: Object.freeze({
      latitude: note.location.latitude,
      longitude: note.location.longitude,
    }),
    message: note.message,
  });
}
