import { fileURLToPath } from "node:url";

import request from "supertest";
import { describe, expect, it, vi } from "vitest";

import { resolveSettings } from "../src/config.js";
import { createApp } from "../src/main.js";
import { ScanService } from "../src/service.js";
import { blankImage, ean13Image, toDataUri } from "./fixtures.js";

const settings = resolveSettings({
  requestLogFormat: "tiny",
  publicDir: fileURLToPath(new URL("../../../public", import.meta.url)),
});

function buildApp(service = new ScanService()) {
  return createApp(service, settings);
}

describe("POST /scan", () => {
  it("decodes an EAN-13 frame sent as a data URI", async () => {
    const image = toDataUri(await ean13Image("4006381333931"), "image/png");

    const response = await request(buildApp()).post("/scan").send({ image });

    expect(response.status, JSON.stringify(response.body)).toBe(200);
    expect(response.body).toEqual({ found: true, data: "4006381333931", type: "EAN13" });
  });

  it("reports found false for a blank frame", async () => {
    const image = (await blankImage()).toString("base64");

    const response = await request(buildApp()).post("/scan").send({ image });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ found: false });
  });

  it("accepts a multipart image upload", async () => {
    const response = await request(buildApp())
      .post("/scan")
      .attach("image", await ean13Image("4006381333931", "jpeg"), { filename: "frame.jpg", contentType: "image/jpeg" });

    expect(response.status, JSON.stringify(response.body)).toBe(200);
    expect(response.body).toEqual({ found: true, data: "4006381333931", type: "EAN13" });
  });

  it("rejects an empty image field", async () => {
    const response = await request(buildApp()).post("/scan").send({ image: "" });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "Image payload is empty" });
  });

  it("rejects a request without an image", async () => {
    const response = await request(buildApp()).post("/scan").send({});

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "No image data provided" });
  });

  it("rejects bytes that are not an image", async () => {
    const image = Buffer.from("plain text pretending to be a frame").toString("base64");

    const response = await request(buildApp()).post("/scan").send({ image });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "Invalid image data" });
  });

  it("rejects malformed JSON", async () => {
    const response = await request(buildApp())
      .post("/scan")
      .set("Content-Type", "application/json")
      .send('{"image": ');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "Malformed JSON body" });
  });

  it("turns unexpected failures into a 500 without stopping the app", async () => {
    const service = new ScanService({
      detector: {
        detect: () => {
          throw new Error("reader exploded");
        },
      },
    });
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const app = buildApp(service);
    const image = (await blankImage()).toString("base64");

    const failed = await request(app).post("/scan").send({ image });
    const health = await request(app).get("/health");

    expect(failed.status).toBe(500);
    expect(failed.body).toEqual({ error: "reader exploded" });
    expect(health.body).toEqual({ status: "ok" });
    errorSpy.mockRestore();
  });

  it("rejects a data URI that declares a non-image type", async () => {
    const image = toDataUri(await blankImage(), "text/plain");

    const response = await request(buildApp()).post("/scan").send({ image });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "Unsupported media type: text/plain" });
  });

  it("rejects an upload whose part is not an image", async () => {
    const response = await request(buildApp())
      .post("/scan")
      .attach("image", await blankImage(), { filename: "notes.txt", contentType: "text/plain" });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "Unsupported media type: text/plain" });
  });

  it("allows cross-origin callers", async () => {
    const response = await request(buildApp())
      .post("/scan")
      .set("Origin", "http://camera.example")
      .send({ image: "" });

    expect(response.headers["access-control-allow-origin"]).toBe("*");
  });
});

describe("GET /health", () => {
  it("reports ok regardless of prior scan failures", async () => {
    const app = buildApp();
    await request(app).post("/scan").send({ image: "" });
    await request(app).post("/scan").send({ image: "%%%" });

    const response = await request(app).get("/health");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: "ok" });
  });
});

describe("GET /", () => {
  it("serves the scanner page", async () => {
    const response = await request(buildApp()).get("/");

    expect(response.status).toBe(200);
    expect(response.headers["content-type"]).toContain("text/html");
    expect(response.text).toContain("<title>Barcode Scanner</title>");
  });
});
