import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { env } from "../config/env.js";
import { ValidationError } from "../utils/errors.js";

export type ImageFolder = "recipes/images" | "users/avatars";

const DATA_URI_PATTERN = /^data:image\/([a-z0-9]+);base64,([A-Za-z0-9+/=\s]+)$/i;

export type DecodedImage = {
  extension: string;
  data: Buffer;
};

export const decodeImageDataUri = (value: string, field = "image"): DecodedImage => {
  const match = DATA_URI_PATTERN.exec(value.trim());
  if (!match) {
    throw new ValidationError(field, "Image must be a data:image/<ext>;base64 URI.");
  }

  const [, extension, payload] = match;
  const data = Buffer.from(payload.replace(/\s/g, ""), "base64");
  if (data.length === 0) {
    throw new ValidationError(field, "Image payload is empty.");
  }
  if (data.length > env.MAX_IMAGE_BYTES) {
    throw new ValidationError(field, `Image must not exceed ${env.MAX_IMAGE_BYTES} bytes.`);
  }

  return { extension: extension.toLowerCase(), data };
};

const absolutePath = (relativePath: string) => path.resolve(env.MEDIA_ROOT, relativePath);

/** Writes a decoded data URI under MEDIA_ROOT and returns its media-relative path. */
export const storeImage = async (value: string, folder: ImageFolder, field = "image") => {
  const image = decodeImageDataUri(value, field);
  const relativePath = `${folder}/${randomUUID()}.${image.extension}`;
  const target = absolutePath(relativePath);

  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, image.data);
  return relativePath;
};

export const discardImage = async (relativePath: string | null) => {
  if (!relativePath) {
    return;
  }
  await rm(absolutePath(relativePath), { force: true });
};

export const mediaUrl = (relativePath: string | null) =>
  relativePath ? new URL(`/media/${relativePath}`, env.SERVER_URL).toString() : null;
