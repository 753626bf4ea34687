import express from "express";
import request from "supertest";
import { z } from "zod";
import { validate } from "../../middleware/validation.middleware";

const bodySchema = z.object({
  minutes: z.coerce.number().int().positive(),
  label: z.string().trim().min(1).default("untitled"),
});

const paramsSchema = z.object({
  id: z.string().uuid("Invalid ID"),
});

function buildApp() {
  const app = express();
  app.use(express.json());
  app.post("/items/:id", validate({ body: bodySchema, params: paramsSchema }), (req, res) => {
    res.json({ body: req.body });
  });
  return app;
}

const validId = "550e8400-e29b-41d4-a716-446655440000";

describe("Validation Middleware", () => {
  it("replaces the body with the parsed value", async () => {
    const res = await request(buildApp()).post(`/items/${validId}`).send({ minutes: "45" });

    expect(res.status).toBe(200);
    expect(res.body.body).toEqual({ minutes: 45, label: "untitled" });
  });

  it("reports body issues with their paths", async () => {
    const res = await request(buildApp()).post(`/items/${validId}`).send({ minutes: -1 });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Validation failed");
    expect(res.body.details).toHaveLength(1);
    expect(res.body.details[0]).toMatchObject({ path: "minutes", code: "too_small" });
  });

  it("checks route params", async () => {
    const res = await request(buildApp()).post("/items/not-a-uuid").send({ minutes: 10 });

    expect(res.status).toBe(400);
    expect(res.body.details[0]).toMatchObject({ path: "id", message: "Invalid ID" });
  });
});
