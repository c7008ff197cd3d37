import { MAX_ROW_ID } from "../constants.js";
import { NotFoundError } from "./errors.js";

export const readParam = (value: string | string[] | undefined) => (Array.isArray(value) ? value[0] : value);

/** Route ids are positive integers; anything else cannot name a row. */
export const readIdParam = (value: string | string[] | undefined, notFoundMessage: string) => {
  const raw = readParam(value);
  if (!raw || !/^\d+$/.test(raw)) {
    throw new NotFoundError(notFoundMessage);
  }

  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id < 1 || id > MAX_ROW_ID) {
    throw new NotFoundError(notFoundMessage);
  }

  return id;
};
