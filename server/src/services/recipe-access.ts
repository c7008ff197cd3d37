import { and, count, desc, eq, inArray, type SQL } from "drizzle-orm";
import { db } from "../config/db.js";
import { favorites, recipes, recipeTags, shoppingCartItems, tags } from "../db/schema.js";
import { NotFoundError } from "../utils/errors.js";
import { pageOffset, type PageRequest } from "../utils/pagination.js";
import { mediaUrl } from "./images.js";
import { toUserView, type UserView } from "./users.js";

export type RecipeIngredientView = {
  id: number;
  name: string;
  measurementUnit: string;
  amount: number;
};

export type TagView = {
  id: number;
  name: string;
  slug: string;
};

export type RecipeView = {
  id: number;
  tags: TagView[];
  author: UserView;
  ingredients: RecipeIngredientView[];
  isFavorited: boolean;
  isInShoppingCart: boolean;
  name: string;
  image: string | null;
  text: string;
  cookingTime: number;
};

export type RecipeFilters = {
  author?: number;
  tags: string[];
  isFavorited: boolean;
  isInShoppingCart: boolean;
};

const loadRecipes = (recipeIds: number[], viewerId: number | null) =>
  db.query.recipes.findMany({
    where: inArray(recipes.id, recipeIds),
    with: {
      author: {
        with: {
          subscribers: {
            columns: { subscriberId: true },
            where: (subscription, { eq: equals, sql }) =>
              viewerId === null ? sql`false` : equals(subscription.subscriberId, viewerId),
          },
        },
      },
      recipeTags: {
        with: { tag: true },
      },
      recipeIngredients: {
        with: { ingredient: true },
        orderBy: (line, { asc }) => [asc(line.id)],
      },
      favorites: {
        columns: { userId: true },
        where: (favorite, { eq: equals, sql }) => (viewerId === null ? sql`false` : equals(favorite.userId, viewerId)),
      },
      shoppingCartItems: {
        columns: { userId: true },
        where: (item, { eq: equals, sql }) => (viewerId === null ? sql`false` : equals(item.userId, viewerId)),
      },
    },
  });

type LoadedRecipe = Awaited<ReturnType<typeof loadRecipes>>[number];

export const toRecipeView = (recipe: LoadedRecipe): RecipeView => ({
  id: recipe.id,
  tags: recipe.recipeTags
    .map(({ tag }) => ({ id: tag.id, name: tag.name, slug: tag.slug }))
    .sort((left, right) => left.name.localeCompare(right.name)),
  author: toUserView(recipe.author, recipe.author.subscribers.length > 0),
  ingredients: recipe.recipeIngredients.map((line) => ({
    id: line.ingredient.id,
    name: line.ingredient.name,
    measurementUnit: line.ingredient.measurementUnit,
    amount: line.amount,
  })),
  isFavorited: recipe.favorites.length > 0,
  isInShoppingCart: recipe.shoppingCartItems.length > 0,
  name: recipe.name,
  image: mediaUrl(recipe.image),
  text: recipe.text,
  cookingTime: recipe.cookingTime,
});

/** Read views in the order of `recipeIds`; ids with no row are skipped. */
export const getRecipeViews = async (recipeIds: number[], viewerId: number | null) => {
  if (recipeIds.length === 0) {
    return [];
  }

  const rows = await loadRecipes(recipeIds, viewerId);
  const byId = new Map(rows.map((row) => [row.id, row]));
  return recipeIds.flatMap((id) => {
    const recipe = byId.get(id);
    return recipe ? [toRecipeView(recipe)] : [];
  });
};

export const getRecipeForUser = async (recipeId: number, viewerId: number | null) => {
  const [recipe] = await getRecipeViews([recipeId], viewerId);
  if (!recipe) {
    throw new NotFoundError("Recipe not found.");
  }
  return recipe;
};

export const recipeFilterClause = (filters: RecipeFilters, viewerId: number | null): SQL | undefined => {
  const clauses: SQL[] = [];

  if (filters.author !== undefined) {
    clauses.push(eq(recipes.authorId, filters.author));
  }

  if (filters.tags.length > 0) {
    clauses.push(
      inArray(
        recipes.id,
        db
          .select({ recipeId: recipeTags.recipeId })
          .from(recipeTags)
          .innerJoin(tags, eq(tags.id, recipeTags.tagId))
          .where(inArray(tags.slug, filters.tags)),
      ),
    );
  }

  // Membership filters only narrow the list for a signed-in viewer.
  if (filters.isFavorited && viewerId !== null) {
    clauses.push(
      inArray(
        recipes.id,
        db.select({ recipeId: favorites.recipeId }).from(favorites).where(eq(favorites.userId, viewerId)),
      ),
    );
  }

  if (filters.isInShoppingCart && viewerId !== null) {
    clauses.push(
      inArray(
        recipes.id,
        db
          .select({ recipeId: shoppingCartItems.recipeId })
          .from(shoppingCartItems)
          .where(eq(shoppingCartItems.userId, viewerId)),
      ),
    );
  }

  return and(...clauses);
};

export const listRecipeViews = async (filters: RecipeFilters, viewerId: number | null, page: PageRequest) => {
  const where = recipeFilterClause(filters, viewerId);

  const [{ value: total }] = await db.select({ value: count() }).from(recipes).where(where);
  const pageRows = await db
    .select({ id: recipes.id })
    .from(recipes)
    .where(where)
    .orderBy(desc(recipes.createdAt), desc(recipes.id))
    .limit(page.limit)
    .offset(pageOffset(page));

  return {
    total,
    results: await getRecipeViews(
      pageRows.map((row) => row.id),
      viewerId,
    ),
  };
};
