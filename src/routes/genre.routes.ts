import { Router } from 'express';
import genreController from '../controllers/genre.controller';

const router = Router();

router.get('/genre', (req, res) => genreController.lookup(req, res));

export default router;
