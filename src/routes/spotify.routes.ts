import { Router } from 'express';
import spotifyController from '../controllers/spotify.controller';

const router = Router();

router.get('/spotify/status', (req, res) => spotifyController.getStatus(req, res));

// Authorization code flow, run once to obtain SPOTIFY_REFRESH_TOKEN
router.get('/spotify/login', (req, res) => spotifyController.login(req, res));
router.get('/spotify/callback', (req, res) => spotifyController.callback(req, res));

export default router;
