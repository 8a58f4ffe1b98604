/**
 * Hello Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/hello  →  "hello world!" (text/plain)
 *
 * A minimal handler that logs through `req.log`, so its record and the
 * access line share the request's span fields.
 */
import { logger } from '@core/logger';
import { Router } from 'express';

const router = Router();

router.get('/hello', (req, res) => {
  (req.log ?? logger).info({ route: 'hello' }, 'index');
  res.status(200).type('text/plain').send('hello world!');
});

export { router as helloRoutes };
