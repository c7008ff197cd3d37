import { Router } from "express";
import { getIngredient, getTag, listIngredients, listTags } from "../services/catalog.js";
import { asyncHandler } from "../utils/async-handler.js";
import { readIdParam } from "../utils/params.js";
import { ingredientQuerySchema } from "./schemas.js";

export const tagRouter = Router();
export const ingredientRouter = Router();

tagRouter.get(
  "/",
  asyncHandler(async (_req, res) => {
    res.json(await listTags());
  }),
);

tagRouter.get(
  "/:id",
  asyncHandler(async (req, res) => {
    res.json(await getTag(readIdParam(req.params.id, "Tag not found.")));
  }),
);

ingredientRouter.get(
  "/",
  asyncHandler(async (req, res) => {
    const { name } = ingredientQuerySchema.parse(req.query);
    res.json(await listIngredients(name));
  }),
);

ingredientRouter.get(
  "/:id",
  asyncHandler(async (req, res) => {
    res.json(await getIngredient(readIdParam(req.params.id, "Ingredient not found.")));
  }),
);
