import { relations, sql } from "drizzle-orm";
import { check, index, integer, pgTable, serial, text, timestamp, unique, varchar } from "drizzle-orm/pg-core";
import { LIMITS } from "../constants.js";

// Every foreign key cascades: removing a user, recipe, tag or ingredient
// removes the join rows and recipes that hang off it.

export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  email: varchar("email", { length: LIMITS.emailLength }).notNull().unique("users_email_unique"),
  username: varchar("username", { length: LIMITS.usernameLength }).notNull().unique("users_username_unique"),
  firstName: varchar("first_name", { length: LIMITS.personNameLength }).notNull(),
  lastName: varchar("last_name", { length: LIMITS.personNameLength }).notNull(),
  passwordHash: text("password_hash").notNull(),
  avatar: text("avatar"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export const subscriptions = pgTable(
  "subscriptions",
  {
    id: serial("id").primaryKey(),
    subscriberId: integer("subscriber_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    authorId: integer("author_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique("subscriptions_subscriber_author_unique").on(table.subscriberId, table.authorId),
    check("subscriptions_no_self_subscription", sql`${table.subscriberId} <> ${table.authorId}`),
    index("subscriptions_author_id_idx").on(table.authorId),
  ],
);

export const tags = pgTable("tags", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: LIMITS.tagNameLength }).notNull().unique("tags_name_unique"),
  slug: varchar("slug", { length: LIMITS.tagSlugLength }).notNull().unique("tags_slug_unique"),
});

export const ingredients = pgTable(
  "ingredients",
  {
    id: serial("id").primaryKey(),
    name: varchar("name", { length: LIMITS.ingredientNameLength }).notNull(),
    measurementUnit: varchar("measurement_unit", { length: LIMITS.measurementUnitLength }).notNull(),
  },
  (table) => [unique("ingredients_name_unit_unique").on(table.name, table.measurementUnit)],
);

export const recipes = pgTable(
  "recipes",
  {
    id: serial("id").primaryKey(),
    authorId: integer("author_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    name: varchar("name", { length: LIMITS.recipeNameLength }).notNull(),
    image: text("image").notNull(),
    text: text("text").notNull(),
    cookingTime: integer("cooking_time").notNull(),
    shortLink: varchar("short_link", { length: LIMITS.shortLinkLength }).notNull().unique("recipes_short_link_unique"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    check(
      "recipes_cooking_time_range",
      sql`${table.cookingTime} BETWEEN ${sql.raw(String(LIMITS.minCookingTime))} AND ${sql.raw(String(LIMITS.maxCookingTime))}`,
    ),
    index("recipes_author_id_idx").on(table.authorId),
    index("recipes_created_at_idx").on(table.createdAt),
  ],
);

export const recipeTags = pgTable(
  "recipe_tags",
  {
    id: serial("id").primaryKey(),
    recipeId: integer("recipe_id")
      .notNull()
      .references(() => recipes.id, { onDelete: "cascade" }),
    tagId: integer("tag_id")
      .notNull()
      .references(() => tags.id, { onDelete: "cascade" }),
  },
  (table) => [unique("recipe_tags_recipe_tag_unique").on(table.recipeId, table.tagId)],
);

export const recipeIngredients = pgTable(
  "recipe_ingredients",
  {
    id: serial("id").primaryKey(),
    recipeId: integer("recipe_id")
      .notNull()
      .references(() => recipes.id, { onDelete: "cascade" }),
    ingredientId: integer("ingredient_id")
      .notNull()
      .references(() => ingredients.id, { onDelete: "cascade" }),
    amount: integer("amount").notNull(),
  },
  (table) => [
    unique("recipe_ingredients_recipe_ingredient_unique").on(table.recipeId, table.ingredientId),
    check(
      "recipe_ingredients_amount_range",
      sql`${table.amount} BETWEEN ${sql.raw(String(LIMITS.minAmount))} AND ${sql.raw(String(LIMITS.maxAmount))}`,
    ),
  ],
);

// Favorites and shopping-cart entries share one shape; they stay two tables
// so each relation keeps its own name and constraint.
const membershipColumns = () => ({
  id: serial("id").primaryKey(),
  userId: integer("user_id")
    .notNull()
    .references(() => users.id, { onDelete: "cascade" }),
  recipeId: integer("recipe_id")
    .notNull()
    .references(() => recipes.id, { onDelete: "cascade" }),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export const favorites = pgTable("favorites", membershipColumns(), (table) => [
  unique("favorites_user_recipe_unique").on(table.userId, table.recipeId),
]);

export const shoppingCartItems = pgTable("shopping_cart_items", membershipColumns(), (table) => [
  unique("shopping_cart_items_user_recipe_unique").on(table.userId, table.recipeId),
]);

export const usersRelations = relations(users, ({ many }) => ({
  recipes: many(recipes),
  subscriptions: many(subscriptions, { relationName: "subscriber" }),
  subscribers: many(subscriptions, { relationName: "author" }),
  favorites: many(favorites),
  shoppingCartItems: many(shoppingCartItems),
}));

export const subscriptionsRelations = relations(subscriptions, ({ one }) => ({
  subscriber: one(users, {
    fields: [subscriptions.subscriberId],
    references: [users.id],
    relationName: "subscriber",
  }),
  author: one(users, {
    fields: [subscriptions.authorId],
    references: [users.id],
    relationName: "author",
  }),
}));

export const tagsRelations = relations(tags, ({ many }) => ({
  recipeTags: many(recipeTags),
}));

export const ingredientsRelations = relations(ingredients, ({ many }) => ({
  recipeIngredients: many(recipeIngredients),
}));

export const recipesRelations = relations(recipes, ({ one, many }) => ({
  author: one(users, {
    fields: [recipes.authorId],
    references: [users.id],
  }),
  recipeTags: many(recipeTags),
  recipeIngredients: many(recipeIngredients),
  favorites: many(favorites),
  shoppingCartItems: many(shoppingCartItems),
}));

export const recipeTagsRelations = relations(recipeTags, ({ one }) => ({
  recipe: one(recipes, {
    fields: [recipeTags.recipeId],
    references: [recipes.id],
  }),
  tag: one(tags, {
    fields: [recipeTags.tagId],
    references: [tags.id],
  }),
}));

export const recipeIngredientsRelations = relations(recipeIngredients, ({ one }) => ({
  recipe: one(recipes, {
    fields: [recipeIngredients.recipeId],
    references: [recipes.id],
  }),
  ingredient: one(ingredients, {
    fields: [recipeIngredients.ingredientId],
    references: [ingredients.id],
  }),
}));

export const favoritesRelations = relations(favorites, ({ one }) => ({
  user: one(users, {
    fields: [favorites.userId],
    references: [users.id],
  }),
  recipe: one(recipes, {
    fields: [favorites.recipeId],
    references: [recipes.id],
  }),
}));

export const shoppingCartItemsRelations = relations(shoppingCartItems, ({ one }) => ({
  user: one(users, {
    fields: [shoppingCartItems.userId],
    references: [users.id],
  }),
  recipe: one(recipes, {
    fields: [shoppingCartItems.recipeId],
    references: [recipes.id],
  }),
}));

export type UserRecord = typeof users.$inferSelect;
