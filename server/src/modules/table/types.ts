// TableInstance types

import type { RandomSource, Table, TableEvent } from '../../shared/logic/index.js';
import type { Server, Socket } from 'socket.io';
import type {
  ClientToServerEvents,
  PrivateTableView,
  PublicTableView,
  ServerToClientEvents,
} from '../../shared/types/websocket.js';

// Set by the handshake middleware before any event handler runs
export interface SocketData {
  playerId?: string;
}

type InterServerEvents = Record<string, never>;

export type GameServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
export type GameSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

/**
 * Pushes committed state to clients. Transport-agnostic: the socket.io
 * implementation is BroadcastService.
 */
export interface StateNotifier {
  notifyStateChanged(tableId: string, publicView: PublicTableView): void;
  notifyPlayerState(tableId: string, playerId: string, privateView: PrivateTableView): void;
}

export interface TableRuntimeOptions {
  actionTimeoutMs: number;
  nextHandDelayMs: number;
  autoStartNextHand: boolean;
  random?: RandomSource;
}

// A transition that reached storage
export interface CommittedTransition {
  table: Table;
  events: TableEvent[];
}
