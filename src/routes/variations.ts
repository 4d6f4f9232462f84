import { Router, type RequestHandler } from 'express';
import { toColorVariationResponse } from '../dtos/shoe';
import type { ShoeService } from '../services/shoe';
import { parseId } from './params';

export function createVariationRoutes(shoeService: ShoeService, requireAuth: RequestHandler) {
  const router = Router();

  router.get('/:id', async (req, res, next) => {
    try {
      const variation = await shoeService.getVariationById(parseId(req.params.id));
      res.json({ success: true, variation: toColorVariationResponse(variation) });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', requireAuth, async (req, res, next) => {
    try {
      const variation = await shoeService.updateVariation(parseId(req.params.id), req.body);
      res.json({
        success: true,
        message: 'Color variation updated successfully!',
        variation: toColorVariationResponse(variation),
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', requireAuth, async (req, res, next) => {
    try {
      await shoeService.deleteVariation(parseId(req.params.id));
      res.json({ success: true, message: 'Color variation removed successfully!' });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
