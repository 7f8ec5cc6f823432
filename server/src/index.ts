import express from 'express';
import cors from 'cors';
import http from 'node:http';
import { Server, type Socket } from 'socket.io';
import { isGameRuleError } from '../../src/engine/errors.js';
import { loadConfig } from './config.js';
import { FireSchema, NewGameSchema, PlaceShipSchema, parsePayload } from './protocol.js';
import { SessionStore, type GameSession } from './sessions.js';

const config = loadConfig();
const corsOrigin = config.corsOrigins.length ? config.corsOrigins : true;

const app = express();
app.use(express.json());
app.use(
  cors({
    origin: corsOrigin,
    credentials: true,
  })
);

const server = http.createServer(app);
const io = new Server(server, {
  cors: {
    origin: corsOrigin,
    credentials: true,
  },
});

const store = new SessionStore(config.ruleset, config.sessionTtlMs, {
  onShot: (session, result) => {
    io.to(session.id).emit('shot', { result });
    emitGameState(session);
  },
  onGameOver: (session, winner) => {
    console.log(`[game] ${session.id} won by ${session.state.sides[winner].name} after ${session.state.shotLog.length} shots`);
    io.to(session.id).emit('game_over', { winner, name: session.state.sides[winner].name });
  },
  onAborted: (session, error) => {
    console.log(`[game] ${session.id} ended: ${error.message}`);
  },
});
setInterval(() => store.cleanup(), 60_000).unref();

app.get('/health', (_req, res) => {
  res.json({ ok: true, now: Date.now() });
});

app.get('/games', (_req, res) => {
  res.json({ games: store.listPublic() });
});

function emitGameState(session: GameSession): void {
  io.to(session.id).emit('game_state', { game: store.snapshot(session) });
}

function emitError(socket: Socket, e: unknown): void {
  if (isGameRuleError(e)) {
    socket.emit('error_msg', { message: e.message, code: e.code });
    return;
  }
  const message = e instanceof Error ? e.message : String(e);
  console.warn(`[server] ${socket.id}: ${message}`);
  socket.emit('error_msg', { message });
}

io.on('connection', (socket) => {
  let gameId: string | null = null;

  function current(): GameSession {
    const session = gameId ? store.get(gameId) : undefined;
    if (!session) {
      throw new Error('No game in progress, send new_game first');
    }
    return session;
  }

  function handle(event: string, fn: (payload: unknown) => void): void {
    socket.on(event, (payload: unknown) => {
      try {
        fn(payload);
      } catch (e) {
        emitError(socket, e);
      }
    });
  }

  handle('new_game', (payload) => {
    const data = parsePayload(NewGameSchema, payload ?? {});
    if (gameId) {
      void socket.leave(gameId);
      store.close(gameId, 'Replaced by a new game');
    }
    const session = store.create(data.name ?? 'Player', data.seed);
    gameId = session.id;
    void socket.join(session.id);
    console.log(`[game] ${session.id} created (seed ${session.seed})`);
    socket.emit('game_created', { id: session.id, ruleset: config.ruleset });
    emitGameState(session);
  });

  handle('place_ship', (payload) => {
    const data = parsePayload(PlaceShipSchema, payload);
    const session = current();
    store.placeShip(session, data.ship, { row: data.row, col: data.col }, data.orientation);
    emitGameState(session);
  });

  handle('auto_place', () => {
    const session = current();
    store.autoPlace(session);
    emitGameState(session);
  });

  handle('start', () => {
    const session = current();
    store.start(session);
    console.log(`[game] ${session.id} battle started`);
    emitGameState(session);
  });

  handle('fire', (payload) => {
    const data = parsePayload(FireSchema, payload);
    store.fire(current(), { row: data.row, col: data.col });
  });

  socket.on('disconnect', () => {
    if (gameId) {
      store.close(gameId, 'Player disconnected');
    }
  });
});

server.listen(config.port, () => {
  console.log(`[server] listening on :${config.port}`);
  console.log(`[server] board ${config.ruleset.boardSize}x${config.ruleset.boardSize}, ${config.ruleset.ships.length} ships`);
  if (config.corsOrigins.length) {
    console.log(`[server] cors origins: ${config.corsOrigins.join(', ')}`);
  }
});
