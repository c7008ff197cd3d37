import { readFile } from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { decodeImageDataUri, discardImage, mediaUrl, storeImage } from "../src/services/images.js";
import { ValidationError } from "../src/utils/errors.js";
import { PNG_DATA_URI } from "./helpers/fixtures.js";

describe("image data URIs", () => {
  it("decodes the extension and payload", () => {
    const image = decodeImageDataUri(PNG_DATA_URI);

    expect(image.extension).toBe("png");
    expect(image.data.subarray(1, 4).toString("ascii")).toBe("PNG");
  });

  it("rejects values that are not base64 image URIs", () => {
    expect(() => decodeImageDataUri("https://example.com/cat.png")).toThrow(ValidationError);
    expect(() => decodeImageDataUri("data:text/plain;base64,aGVsbG8=")).toThrow(
      "Image must be a data:image/<ext>;base64 URI.",
    );
  });

  it("rejects payloads over the size limit", () => {
    const oversized = `data:image/png;base64,${Buffer.alloc(2048, 1).toString("base64")}`;

    expect(() => decodeImageDataUri(oversized, "avatar")).toThrow("Image must not exceed 1024 bytes.");
  });

  it("stores, exposes and discards files under the media root", async () => {
    const relativePath = await storeImage(PNG_DATA_URI, "recipes/images");

    expect(relativePath).toMatch(/^recipes\/images\/[0-9a-f-]{36}\.png$/);
    expect(mediaUrl(relativePath)).toBe(`http://localhost:4000/media/${relativePath}`);

    const absolute = path.resolve(process.env.MEDIA_ROOT ?? "", relativePath);
    await expect(readFile(absolute)).resolves.toHaveLength(decodeImageDataUri(PNG_DATA_URI).data.length);

    await discardImage(relativePath);
    await expect(readFile(absolute)).rejects.toThrow();
  });

  it("has no URL for a missing image", () => {
    expect(mediaUrl(null)).toBeNull();
  });
});
