import express from 'express';
import config from './config/environment';
import { corsMiddleware } from './middleware/cors.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import playlistRoutes from './routes/playlist.routes';
import spotifyRoutes from './routes/spotify.routes';
import genreRoutes from './routes/genre.routes';

export function createApp(): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(corsMiddleware);

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: config.env,
    });
  });

  app.get('/api', (_req, res) => {
    res.json({
      message: '🎵 Playlist Flow API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        spotify: {
          status: '/api/spotify/status',
          login: '/api/spotify/login',
          callback: '/api/spotify/callback',
        },
        playlists: '/api/playlists',
        tracks: '/api/playlists/:id/tracks',
        reorder: 'POST /api/playlists/:id/reorder',
        genre: '/api/genre?track=&artist=',
      },
      socket: {
        start: 'reorder:start',
        events: ['reorder:progress', 'reorder:done', 'reorder:error'],
      },
    });
  });

  // API Routes
  app.use('/api', spotifyRoutes);
  app.use('/api', playlistRoutes);
  app.use('/api', genreRoutes);

  // Error handlers
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
