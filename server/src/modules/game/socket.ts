import { TableManager } from '../table/TableManager.js';
import type { TableStateStore } from '../table/store/TableStateStore.js';
import { BroadcastService } from '../table/helpers/BroadcastService.js';
import type { GameServer, GameSocket, TableRuntimeOptions } from '../table/types.js';
import { handleGameAction, handleHandStart, handleTableStart, handleTableWatch } from './handlers.js';

interface GameSocketDependencies {
  tableManager: TableManager;
}

export function setupGameSocket(io: GameServer, store: TableStateStore, options: TableRuntimeOptions): GameSocketDependencies {
  const tableManager = new TableManager(store, new BroadcastService(io), options);

  io.on('connection', (socket: GameSocket) => {
    console.log(`[Socket] Client connected: ${socket.id} (player ${socket.data.playerId ?? 'unknown'})`);

    socket.on('table:watch', (data, ack) => {
      void handleTableWatch(socket, data, ack, tableManager);
    });

    socket.on('table:start', (data, ack) => {
      void handleTableStart(socket, data, ack, tableManager);
    });

    socket.on('hand:start', (data, ack) => {
      void handleHandStart(socket, data, ack, tableManager);
    });

    socket.on('game:action', (data, ack) => {
      void handleGameAction(socket, data, ack, tableManager);
    });

    socket.on('disconnect', (reason) => {
      console.log(`[Socket] Client disconnected: ${socket.id} (${reason})`);
    });
  });

  return { tableManager };
}
