import { Server as HTTPServer } from 'http';
import { Server, Socket } from 'socket.io';
import type { ExerciseLogEntry, WorkoutStatus } from './types.js';
import type { ProgressPublisher } from './services/sessionLogger.js';

export interface ServerToClientEvents {
  'exercise-logged': (entry: ExerciseLogEntry) => void;
  'workout-status': (payload: { workoutId: string; status: WorkoutStatus }) => void;
}

export interface ClientToServerEvents {
  'watch-workout': (workoutId: unknown) => void;
  'unwatch-workout': (workoutId: unknown) => void;
}

export type ProgressServer = Server<ClientToServerEvents, ServerToClientEvents>;

export const workoutRoom = (workoutId: string) => `workout:${workoutId}`;

function roomFor(workoutId: unknown): string | null {
  return typeof workoutId === 'string' && workoutId.trim() ? workoutRoom(workoutId.trim()) : null;
}

/**
 * Socket.IO server for live workout progress.
 * Clients join one room per workout they are following.
 */
export const initializeSocket = (httpServer: HTTPServer, clientUrl: string): ProgressServer => {
  const io: ProgressServer = new Server(httpServer, {
    cors: {
      origin: clientUrl,
      methods: ['GET', 'POST'],
      credentials: true,
    },
  });

  io.on('connection', (socket: Socket<ClientToServerEvents, ServerToClientEvents>) => {
    console.log(`✅ Socket ${socket.id} connected`);

    socket.on('watch-workout', (workoutId) => {
      const room = roomFor(workoutId);
      if (!room) return;
      void socket.join(room);
      console.log(`👀 Socket ${socket.id} watching ${room}`);
    });

    socket.on('unwatch-workout', (workoutId) => {
      const room = roomFor(workoutId);
      if (room) void socket.leave(room);
    });

    socket.on('disconnect', () => {
      console.log(`❌ Socket ${socket.id} disconnected`);
    });

    socket.on('error', (error) => {
      console.error(`Socket error for ${socket.id}:`, error);
    });
  });

  return io;
};

export function createSocketPublisher(io: ProgressServer): ProgressPublisher {
  return {
    exerciseLogged(entry) {
      io.to(workoutRoom(entry.workoutId)).emit('exercise-logged', entry);
    },
    workoutStatusChanged(workoutId, status) {
      io.to(workoutRoom(workoutId)).emit('workout-status', { workoutId, status });
    },
  };
}
