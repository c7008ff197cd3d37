import { Router } from "express";
import { currentUser, optionalUser, requireAuth } from "../middleware/auth.js";
import { addRecipeTo, removeRecipeFrom, type MembershipKind } from "../services/interactions.js";
import { getRecipeForUser, listRecipeViews } from "../services/recipe-access.js";
import { createRecipe, deleteRecipe, updateRecipe } from "../services/recipes.js";
import { aggregateShoppingList } from "../services/shopping-list.js";
import { loadPdfFont, renderShoppingListPdf } from "../services/shopping-list-pdf.js";
import { getRecipeShortLink } from "../services/short-link.js";
import { asyncHandler } from "../utils/async-handler.js";
import { paginationQuerySchema, toPage } from "../utils/pagination.js";
import { readIdParam } from "../utils/params.js";
import { recipeListQuerySchema, recipeUpdateSchema, recipeWriteSchema } from "./schemas.js";

export const recipeRouter = Router();

const RECIPE_NOT_FOUND = "Recipe not found.";

recipeRouter.get(
  "/",
  asyncHandler(async (req, res) => {
    const viewer = optionalUser(req);
    const page = paginationQuerySchema.parse(req.query);
    const query = recipeListQuerySchema.parse(req.query);

    const { total, results } = await listRecipeViews(
      {
        author: query.author,
        tags: query.tags,
        isFavorited: query.is_favorited,
        isInShoppingCart: query.is_in_shopping_cart,
      },
      viewer?.id ?? null,
      page,
    );

    res.json(toPage(req, page, total, results));
  }),
);

recipeRouter.get(
  "/download_shopping_cart",
  requireAuth,
  asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const rows = await aggregateShoppingList(user.id);
    const document = renderShoppingListPdf({ rows, username: user.username, font: await loadPdfFont() });

    res.setHeader("Content-Type", "application/pdf");
    res.setHeader("Content-Disposition", 'attachment; filename="shopping_list.pdf"');
    res.send(document);
  }),
);

recipeRouter.get(
  "/:id",
  asyncHandler(async (req, res) => {
    const recipeId = readIdParam(req.params.id, RECIPE_NOT_FOUND);
    res.json(await getRecipeForUser(recipeId, optionalUser(req)?.id ?? null));
  }),
);

recipeRouter.post(
  "/",
  requireAuth,
  asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const draft = recipeWriteSchema.parse(req.body);
    const recipe = await createRecipe(user.id, draft);

    res.status(201).json(await getRecipeForUser(recipe.id, user.id));
  }),
);

recipeRouter.patch(
  "/:id",
  requireAuth,
  asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const recipeId = readIdParam(req.params.id, RECIPE_NOT_FOUND);
    const draft = recipeUpdateSchema.parse(req.body);
    await updateRecipe(recipeId, user.id, draft);

    res.json(await getRecipeForUser(recipeId, user.id));
  }),
);

recipeRouter.delete(
  "/:id",
  requireAuth,
  asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const recipeId = readIdParam(req.params.id, RECIPE_NOT_FOUND);
    await deleteRecipe(recipeId, user.id);

    res.status(204).send();
  }),
);

recipeRouter.get(
  "/:id/get-link",
  asyncHandler(async (req, res) => {
    const recipeId = readIdParam(req.params.id, RECIPE_NOT_FOUND);
    res.json(await getRecipeShortLink(recipeId));
  }),
);

const membershipRoutes: Array<{ path: string; kind: MembershipKind }> = [
  { path: "/:id/favorite", kind: "favorite" },
  { path: "/:id/shopping_cart", kind: "shoppingCart" },
];

for (const { path, kind } of membershipRoutes) {
  recipeRouter.post(
    path,
    requireAuth,
    asyncHandler(async (req, res) => {
      const user = currentUser(req);
      const recipeId = readIdParam(req.params.id, RECIPE_NOT_FOUND);

      res.status(201).json(await addRecipeTo(kind, user.id, recipeId));
    }),
  );

  recipeRouter.delete(
    path,
    requireAuth,
    asyncHandler(async (req, res) => {
      const user = currentUser(req);
      const recipeId = readIdParam(req.params.id, RECIPE_NOT_FOUND);
      await removeRecipeFrom(kind, user.id, recipeId);

      res.status(204).send();
    }),
  );
}
