// socket.io implementation of StateNotifier

import type { PrivateTableView, PublicTableView } from '../../../shared/types/websocket.js';
import type { GameServer, StateNotifier } from '../types.js';

export const tableRoom = (tableId: string) => `table:${tableId}`;
export const playerRoom = (playerId: string) => `player:${playerId}`;

export class BroadcastService implements StateNotifier {
  constructor(private io: GameServer) {}

  // everyone watching the table
  notifyStateChanged(tableId: string, publicView: PublicTableView): void {
    this.io.to(tableRoom(tableId)).emit('table:state', { state: publicView });
  }

  // only the seat's owner; private views carry hole cards
  notifyPlayerState(tableId: string, playerId: string, privateView: PrivateTableView): void {
    this.io.to(playerRoom(playerId)).emit('player:state', { state: privateView });
  }
}
