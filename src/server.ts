import http from 'http';
import { Server } from 'socket.io';
import config from './config/environment';
import { createApp } from './app';
import logger from './utils/logger';
import { setupReorderHandlers } from './handlers/reorder.handler';
import spotifyService from './services/spotify.service';

const app = createApp();
const server = http.createServer(app);
const io = new Server(server, {
  cors: {
    origin: config.cors.allowedOrigins,
    credentials: true,
  },
});

// WebSocket: reorder with live progress
io.on('connection', (socket) => {
  logger.info(`Client connected: ${socket.id}`);
  setupReorderHandlers(socket);

  socket.on('disconnect', () => {
    logger.debug(`Client disconnected: ${socket.id}`);
  });
});

const startServer = () => {
  try {
    server.listen(config.port, () => {
      logger.info(`🚀 Server running on port ${config.port}`);
      logger.info(`🌍 Environment: ${config.env}`);
      logger.info(`🎧 Spotify: ${spotifyService.canModifyPlaylists() ? 'authorized' : spotifyService.isConfigured() ? 'configured, not authorized' : 'not configured'}`);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('SIGTERM signal received: closing HTTP server');
  // closes the underlying HTTP server as well
  io.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });
});

startServer();

export { app, io };
