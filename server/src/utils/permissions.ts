export const canEditRecipe = (payload: { authorId: number; userId: number }) =>
  payload.authorId === payload.userId;

export const canDeleteRecipe = canEditRecipe;

export const canSubscribe = (payload: { subscriberId: number; authorId: number }) =>
  payload.subscriberId !== payload.authorId;
