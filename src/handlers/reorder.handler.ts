import type { Socket } from 'socket.io';
import reorderService, { type ReorderService } from '../services/reorder.service';
import type { ReorderProgress, ReorderResult } from '../types/flow.types';
import { isFlowError, MissingFeaturesError } from '../utils/errors';
import logger from '../utils/logger';
import { parsePlaylistId, parseReorderOptions } from '../utils/validation';

export interface ReorderEvents {
  'reorder:progress': ReorderProgress & { playlistId: string };
  'reorder:done': ReorderResult;
  'reorder:error': { playlistId: string | null; error: string; code?: string; trackIds?: string[] };
}

export type ReorderEmitter = <E extends keyof ReorderEvents>(event: E, payload: ReorderEvents[E]) => void;

/**
 * Run one reorder request coming from a socket client, reporting progress
 * and the outcome through `emit`. Never rejects.
 */
export async function runReorder(
  data: unknown,
  emit: ReorderEmitter,
  reorderer: Pick<ReorderService, 'reorder'> = reorderService
): Promise<void> {
  let playlistId: string | null = null;

  try {
    const id = parsePlaylistId(typeof data === 'object' && data !== null && 'playlistId' in data ? data.playlistId : undefined);
    playlistId = id;
    const options = parseReorderOptions(data);

    const result = await reorderer.reorder({
      playlistId: id,
      ...options,
      onProgress: progress => emit('reorder:progress', { playlistId: id, ...progress }),
    });

    emit('reorder:done', result);
  } catch (error) {
    logger.error(`Reorder via socket failed (${playlistId ?? 'no playlist'}):`, error);
    emit('reorder:error', {
      playlistId,
      error: error instanceof Error ? error.message : 'Reorder failed',
      code: isFlowError(error) ? error.code : undefined,
      trackIds: error instanceof MissingFeaturesError ? error.trackIds : undefined,
    });
  }
}

export function setupReorderHandlers(socket: Socket): void {
  socket.on('reorder:start', (data: unknown) => {
    void runReorder(data, (event, payload) => {
      socket.emit(event, payload);
    });
  });
}
