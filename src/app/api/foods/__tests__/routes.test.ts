import { fileURLToPath } from "url";
import { NextRequest } from "next/server";
import { describe, test, expect, vi, beforeAll, afterAll } from "vitest";
import { GET as listFoods } from "@/app/api/foods/route";
import { POST as resolveFood } from "@/app/api/foods/resolve/route";
import { GET as assessFood } from "@/app/api/foods/safety/route";

const DATA_PATH = fileURLToPath(new URL("../../../../../data/nutrition_data.csv", import.meta.url));

function get(path: string): NextRequest {
  return new NextRequest(`http://localhost${path}`);
}

function post(path: string, body: string): NextRequest {
  return new NextRequest(`http://localhost${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

beforeAll(() => {
  vi.stubEnv("NUTRITION_DATA_PATH", DATA_PATH);
  vi.stubEnv("EMBEDDING_API_URL", "");
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterAll(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("GET /api/foods/safety", () => {
  test("evaluates a food at a serving", async () => {
    const response = await assessFood(get("/api/foods/safety?name=CABBAGE&serving=100g"));
    expect(response.status).toBe(200);

    const body = await response.json();
    expect(body.food).toBe("cabbage");
    expect(body.features.servingSizeGrams).toBe(100);
    expect(body.features.glycemicLoad).toBeCloseTo(1.2, 10);
    expect(body.verdict).toEqual({
      label: "safe",
      explanation:
        "Glycemic load 1.2 is within the safe range (<= 10). " +
        "Glycemic index 20 is within the safe range (<= 55).",
      glycemicLoadCategory: "safe",
      glycemicIndexCategory: "safe",
    });
  });

  test("serving defaults to 100g", async () => {
    const response = await assessFood(get("/api/foods/safety?name=arborio%20rice%20boiled"));
    const body = await response.json();
    expect(body.features.servingSizeGrams).toBe(100);
    expect(body.verdict.label).toBe("unsafe");
  });

  test("unknown food is 404", async () => {
    const response = await assessFood(get("/api/foods/safety?name=nonexistent%20food%20xyz"));
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: {
        code: "NOT_FOUND",
        message: "Food 'nonexistent food xyz' not found in knowledge base",
        details: { foodName: "nonexistent food xyz" },
      },
    });
  });

  test("invalid serving is 400", async () => {
    const response = await assessFood(get("/api/foods/safety?name=cabbage&serving=-100g"));
    expect(response.status).toBe(400);
    const body = await response.json();
    expect(body.error.code).toBe("BAD_REQUEST");
    expect(body.error.details).toEqual({ servingSize: "-100g" });
  });

  test("an out-of-range serving is 400, not a non-finite assessment", async () => {
    const serving = `1${"0".repeat(400)}g`;
    const response = await assessFood(
      get(`/api/foods/safety?name=deli%20turkey%20poached&serving=${serving}`)
    );
    expect(response.status).toBe(400);
    const body = await response.json();
    expect(body.error.code).toBe("BAD_REQUEST");
    expect(body.error.details).toEqual({ servingSize: serving });
  });

  test("missing name is a validation error", async () => {
    const response = await assessFood(get("/api/foods/safety"));
    expect(response.status).toBe(400);
    expect((await response.json()).error.message).toBe("Validation error");
  });
});

describe("POST /api/foods/resolve", () => {
  test("exact match returns no candidates", async () => {
    const response = await resolveFood(
      post("/api/foods/resolve", JSON.stringify({ query: " White  Rice Boiled " }))
    );
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      query: " White  Rice Boiled ",
      exact: "white rice boiled",
      mode: "substring",
      candidates: [],
    });
  });

  test("ambiguous query returns a page of candidates", async () => {
    const first = await resolveFood(post("/api/foods/resolve", JSON.stringify({ query: "rice", topK: 2 })));
    const firstBody = await first.json();
    expect(firstBody.exact).toBeNull();
    expect(firstBody.candidates.map((c: { name: string }) => c.name)).toEqual([
      "white rice boiled",
      "brown rice boiled",
    ]);
    expect(firstBody.candidates[0].score).toBeCloseTo(4 / 17, 10);

    const second = await resolveFood(
      post("/api/foods/resolve", JSON.stringify({ query: "rice", topK: 2, offset: 2 }))
    );
    const secondBody = await second.json();
    expect(secondBody.candidates.map((c: { name: string }) => c.name)).toEqual([
      "basmati rice boiled",
      "arborio rice boiled",
    ]);
  });

  test("topK below 1 is a validation error", async () => {
    const response = await resolveFood(
      post("/api/foods/resolve", JSON.stringify({ query: "rice", topK: 0 }))
    );
    expect(response.status).toBe(400);
    expect((await response.json()).error.message).toBe("Validation error");
  });

  test("malformed JSON is 400", async () => {
    const response = await resolveFood(post("/api/foods/resolve", "{not json"));
    expect(response.status).toBe(400);
    expect((await response.json()).error).toEqual({
      code: "BAD_REQUEST",
      message: "Invalid JSON body",
    });
  });
});

describe("GET /api/foods", () => {
  test("filters by normalized substring", async () => {
    const response = await listFoods(get("/api/foods?q=%20Apple%20"));
    expect(await response.json()).toEqual({
      page: 1,
      pageSize: 25,
      total: 1,
      items: [{ name: "apple raw" }],
    });
  });

  test("pages through all names in load order", async () => {
    const second = await (await listFoods(get("/api/foods?page=2&pageSize=20"))).json();
    expect(second.total).toBe(44);
    expect(second.items).toHaveLength(20);
    expect(second.items[0]).toEqual({ name: "white bread" });

    const last = await (await listFoods(get("/api/foods?page=3&pageSize=20"))).json();
    expect(last.items).toEqual([
      { name: "deli turkey poached" },
      { name: "chicken breast grilled" },
      { name: "salmon baked" },
      { name: "almonds raw" },
    ]);
  });

  test("rejects an oversized page", async () => {
    const response = await listFoods(get("/api/foods?pageSize=500"));
    expect(response.status).toBe(400);
  });
});
