import { Router, type RequestHandler } from 'express';
import {
  changeColorSchema,
  createShoeSchema,
  toColorVariationResponse,
  toShoeResponse,
  updateShoeSchema
} from '../dtos/shoe';
import { parseInput } from '../dtos/validation';
import { NotFoundError } from '../errors';
import type { ShoeService } from '../services/shoe';
import { parseId, queryText } from './params';

export function createShoeRoutes(shoeService: ShoeService, requireAuth: RequestHandler) {
  const router = Router();

  // List shoes, optionally narrowed by brand or a search term (search wins)
  router.get('/', async (req, res, next) => {
    try {
      const search = queryText(req.query.search);
      const brand = search ? undefined : queryText(req.query.brand);

      const shoes = await shoeService.listShoes({ search, brand });

      res.json({
        success: true,
        shoes: shoes.map(toShoeResponse),
        total: shoes.length,
        filters: { search: search ?? null, brand: brand ?? null },
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req, res, next) => {
    try {
      const shoe = await shoeService.getShoeById(parseId(req.params.id));
      res.json({ success: true, shoe: toShoeResponse(shoe) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id/colors', async (req, res, next) => {
    try {
      const shoe = await shoeService.getShoeById(parseId(req.params.id));
      res.json({
        success: true,
        currentColor: shoe.currentColor,
        availableColors: shoe.availableColors,
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id/variations', async (req, res, next) => {
    try {
      const variations = await shoeService.listVariations(parseId(req.params.id));
      res.json({ success: true, variations: variations.map(toColorVariationResponse) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', requireAuth, async (req, res, next) => {
    try {
      const input = parseInput(createShoeSchema, req.body);
      const shoe = await shoeService.createShoe(input);
      res.status(201).json({
        success: true,
        message: 'Shoe added successfully!',
        shoe: toShoeResponse(shoe),
      });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', requireAuth, async (req, res, next) => {
    try {
      const id = parseId(req.params.id);
      const { id: payloadId, ...fields } = parseInput(updateShoeSchema, req.body);

      if (payloadId !== undefined && payloadId !== id) {
        throw new NotFoundError(`Shoe ${payloadId} does not match the requested shoe ${id}`);
      }

      const shoe = await shoeService.updateShoe(id, fields);
      res.json({
        success: true,
        message: 'Shoe updated successfully!',
        shoe: toShoeResponse(shoe),
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', requireAuth, async (req, res, next) => {
    try {
      const id = parseId(req.params.id);
      const deleted = await shoeService.deleteShoe(id);

      if (!deleted) {
        throw new NotFoundError(`Shoe ${id} not found`);
      }

      res.json({ success: true, message: 'Shoe deleted successfully!' });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/color', requireAuth, async (req, res, next) => {
    try {
      const id = parseId(req.params.id);
      const { colorName } = parseInput(changeColorSchema, req.body);
      const currentColor = await shoeService.changeColor(id, colorName);

      res.json({
        success: true,
        message: `Color changed to ${currentColor}`,
        currentColor,
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/variations', requireAuth, async (req, res, next) => {
    try {
      const variation = await shoeService.createVariation(parseId(req.params.id), req.body);
      res.status(201).json({
        success: true,
        message: `Color ${variation.colorName} added successfully!`,
        variation: toColorVariationResponse(variation),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
