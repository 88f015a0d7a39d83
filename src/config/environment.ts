import dotenv from 'dotenv';
import type { MissingFeaturesPolicy } from '../types/flow.types';

dotenv.config();

const parsePolicy = (value: string | undefined): MissingFeaturesPolicy =>
  value === 'reject' ? 'reject' : 'append';

export const config = {
  env: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3001', 10),

  cors: {
    allowedOrigins: process.env.ALLOWED_ORIGINS?.split(',') || ['http://localhost:5173'],
  },

  logging: {
    level: process.env.LOG_LEVEL || 'info',
    dir: process.env.LOG_DIR || 'logs',
  },

  spotify: {
    clientId: process.env.SPOTIFY_CLIENT_ID || '',
    clientSecret: process.env.SPOTIFY_CLIENT_SECRET || '',
    refreshToken: process.env.SPOTIFY_REFRESH_TOKEN || '',
    redirectUri: process.env.SPOTIFY_REDIRECT_URI || 'http://localhost:3001/api/spotify/callback',
  },

  lastfm: {
    apiKey: process.env.LASTFM_API_KEY || '',
  },

  reorder: {
    missingFeatures: parsePolicy(process.env.MISSING_FEATURES_POLICY),
    nameSuffix: process.env.PLAYLIST_NAME_SUFFIX ?? ' - Improved',
  },
};

export default config;
