import { NextResponse } from "next/server";

/**
 * API Discovery Endpoint
 * Returns basic API info and available endpoints
 */
export async function GET() {
  return NextResponse.json({
    name: "Glycemic Guard API",
    version: "1.0.0",
    description: "Blood-sugar safety of single foods: name resolution, per-serving nutrition and glycemic verdicts",
    endpoints: {
      foods: {
        list: "/api/foods",
        resolve: "/api/foods/resolve",
        safety: "/api/foods/safety?name={name}&serving={serving}",
        description: "Canonical food names, fuzzy name resolution and safety evaluation"
      }
    },
    servingFormats: ["100g", "100 g", "1 serving", "2.5 servings"],
    authentication: {
      methods: [
        "Query parameter: ?apiKey=YOUR_KEY",
        "Header: X-API-Key: YOUR_KEY",
        "Header: Authorization: Bearer YOUR_KEY"
      ],
      note: "Only enforced when the server sets API_KEY"
    }
  });
}
