import { Router } from 'express';
import playlistController from '../controllers/playlist.controller';

const router = Router();

router.get('/playlists', (req, res) => playlistController.getAll(req, res));
router.get('/playlists/:id/tracks', (req, res) => playlistController.getTracks(req, res));

// Greedy reorder, optionally saved as a new playlist
router.post('/playlists/:id/reorder', (req, res) => playlistController.reorder(req, res));

export default router;
