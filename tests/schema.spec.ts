import { test, expect } from "@playwright/test";
import {
  ListMealsQuerySchema,
  MealSchema,
  PreferenceSchema,
  SubscriptionSchema,
} from "../src/schema";
import { INITIAL_MEALS } from "../src/data/seedMeals";

const meal = {
  title: "Turkey Chili",
  category: "Main Meals",
  price: 10.5,
  macros: { protein: 40, carbs: 30, fats: 9, calories: 450 },
};

const subscription = {
  email: "member@example.com",
  frequency: "weekly",
  target_protein_g_per_day: 150,
  items: [{ meal_id: "meal-1" }],
};

function failedFields(result: { success: boolean; error?: { errors: { path: (string | number)[] }[] } }) {
  return result.error?.errors.map((e) => e.path.join(".")) ?? [];
}

test.describe("MealSchema", () => {
  test("applies defaults for optional fields", () => {
    expect(MealSchema.parse(meal)).toEqual({
      ...meal,
      description: null,
      diet_tags: [],
      image_url: null,
      is_customizable: false,
      available_add_ons: null,
    });
  });

  test("rejects a negative price", () => {
    const result = MealSchema.safeParse({ ...meal, price: -1 });
    expect(result.success).toBe(false);
    expect(failedFields(result)).toEqual(["price"]);
  });

  test("rejects a negative macro", () => {
    const result = MealSchema.safeParse({
      ...meal,
      macros: { ...meal.macros, protein: -0.1 },
    });
    expect(failedFields(result)).toEqual(["macros.protein"]);
  });

  test("rejects values outside the enumerations", () => {
    expect(failedFields(MealSchema.safeParse({ ...meal, category: "Desserts" }))).toEqual([
      "category",
    ]);
    expect(failedFields(MealSchema.safeParse({ ...meal, diet_tags: ["paleo"] }))).toEqual([
      "diet_tags.0",
    ]);
  });

  test("treats diet tags as a set", () => {
    const parsed = MealSchema.parse({ ...meal, diet_tags: ["vegan", "keto", "vegan"] });
    expect(parsed.diet_tags).toEqual(["vegan", "keto"]);
  });
});

test.describe("SubscriptionSchema", () => {
  test("defaults item servings to 1", () => {
    const parsed = SubscriptionSchema.parse(subscription);
    expect(parsed.items).toEqual([{ meal_id: "meal-1", servings: 1 }]);
  });

  test("bounds the protein target to [20, 400]", () => {
    const at = (value: number) =>
      SubscriptionSchema.safeParse({ ...subscription, target_protein_g_per_day: value }).success;
    expect(at(19.9)).toBe(false);
    expect(at(20)).toBe(true);
    expect(at(400)).toBe(true);
    expect(at(400.1)).toBe(false);
  });

  test("requires at least one item", () => {
    const result = SubscriptionSchema.safeParse({ ...subscription, items: [] });
    expect(failedFields(result)).toEqual(["items"]);
  });

  test("bounds item servings to [0.5, 5]", () => {
    const at = (servings: number) =>
      SubscriptionSchema.safeParse({ ...subscription, items: [{ meal_id: "m", servings }] })
        .success;
    expect(at(0.49)).toBe(false);
    expect(at(0.5)).toBe(true);
    expect(at(5)).toBe(true);
    expect(at(5.01)).toBe(false);
  });

  test("accepts notes as text, null or absent", () => {
    expect(SubscriptionSchema.parse({ ...subscription, notes: null }).notes).toBeNull();
    expect(SubscriptionSchema.parse({ ...subscription, notes: "no nuts" }).notes).toBe("no nuts");
    expect(SubscriptionSchema.parse(subscription).notes).toBeUndefined();
  });

  test("rejects an unknown frequency and a malformed email", () => {
    expect(failedFields(SubscriptionSchema.safeParse({ ...subscription, frequency: "daily" }))).toEqual([
      "frequency",
    ]);
    expect(failedFields(SubscriptionSchema.safeParse({ ...subscription, email: "not-an-email" }))).toEqual([
      "email",
    ]);
  });
});

test.describe("PreferenceSchema", () => {
  test("defaults target and filters", () => {
    expect(PreferenceSchema.parse({ email: "member@example.com" })).toEqual({
      email: "member@example.com",
      target_protein_g_per_day: 120,
      diet_filters: [],
    });
  });

  test("rejects a target below 20", () => {
    const result = PreferenceSchema.safeParse({ email: "member@example.com", target_protein_g_per_day: 10 });
    expect(failedFields(result)).toEqual(["target_protein_g_per_day"]);
  });
});

test.describe("ListMealsQuerySchema", () => {
  test("coerces min_protein from the query string", () => {
    expect(ListMealsQuerySchema.parse({ min_protein: "30" })).toEqual({ min_protein: 30 });
  });

  test("leaves absent filters undefined", () => {
    expect(ListMealsQuerySchema.parse({})).toEqual({});
  });

  test("treats blank category and diet as absent", () => {
    expect(ListMealsQuerySchema.parse({ category: "", diet: "" })).toEqual({});
  });

  test("still rejects values outside the enumerations", () => {
    expect(ListMealsQuerySchema.safeParse({ category: "Lunch" }).success).toBe(false);
    expect(ListMealsQuerySchema.safeParse({ diet: "paleo" }).success).toBe(false);
  });

  test("rejects non-numeric and negative thresholds", () => {
    expect(ListMealsQuerySchema.safeParse({ min_protein: "abc" }).success).toBe(false);
    expect(ListMealsQuerySchema.safeParse({ min_protein: "-1" }).success).toBe(false);
  });
});

test.describe("INITIAL_MEALS", () => {
  test("holds six valid meals across the three categories", () => {
    expect(INITIAL_MEALS).toHaveLength(6);
    for (const m of INITIAL_MEALS) {
      expect(MealSchema.safeParse(m).success).toBe(true);
    }
    const categories = new Set(INITIAL_MEALS.map((m) => m.category));
    expect([...categories].sort()).toEqual(["Breakfasts", "Main Meals", "Smoothies & Shakes"]);
  });

  test("has exactly one customizable smoothie with five add-ons", () => {
    const customizable = INITIAL_MEALS.filter((m) => m.is_customizable);
    expect(customizable).toHaveLength(1);
    expect(customizable[0].category).toBe("Smoothies & Shakes");
    expect(customizable[0].available_add_ons).toEqual([
      "whey",
      "vegan protein",
      "creatine",
      "peanut butter",
      "chia seeds",
    ]);
  });
});
