import type { Meal } from "../schema";

/**
 * Built-in example catalog inserted by POST /seed into an empty meal collection.
 */
export const INITIAL_MEALS: readonly Meal[] = [
  {
    title: "Protein Pancakes",
    description: "Fluffy oat-banana pancakes with whey.",
    category: "Breakfasts",
    diet_tags: ["vegetarian"],
    price: 9.99,
    macros: { protein: 35, carbs: 45, fats: 8, calories: 420 },
    image_url: null,
    is_customizable: false,
    available_add_ons: null,
  },
  {
    title: "Spinach Omelette",
    description: "Egg whites, spinach, feta.",
    category: "Breakfasts",
    diet_tags: ["keto"],
    price: 8.5,
    macros: { protein: 32, carbs: 6, fats: 14, calories: 290 },
    image_url: null,
    is_customizable: false,
    available_add_ons: null,
  },
  {
    title: "Greek Yogurt Bowl",
    description: "Greek yogurt, berries, almonds.",
    category: "Breakfasts",
    diet_tags: ["low-carb"],
    price: 7.9,
    macros: { protein: 28, carbs: 22, fats: 10, calories: 320 },
    image_url: null,
    is_customizable: false,
    available_add_ons: null,
  },
  {
    title: "Chicken Power Bowl",
    description: "Grilled chicken, quinoa, veggies.",
    category: "Main Meals",
    diet_tags: [],
    price: 12.99,
    macros: { protein: 50, carbs: 40, fats: 12, calories: 520 },
    image_url: null,
    is_customizable: false,
    available_add_ons: null,
  },
  {
    title: "Tofu Teriyaki Bowl",
    description: "High-protein tofu, brown rice, broccoli.",
    category: "Main Meals",
    diet_tags: ["vegan"],
    price: 11.5,
    macros: { protein: 35, carbs: 55, fats: 14, calories: 540 },
    image_url: null,
    is_customizable: false,
    available_add_ons: null,
  },
  {
    title: "Custom Protein Smoothie",
    description: "Build your own shake.",
    category: "Smoothies & Shakes",
    diet_tags: ["vegan"],
    price: 6.99,
    macros: { protein: 25, carbs: 30, fats: 6, calories: 310 },
    image_url: null,
    is_customizable: true,
    available_add_ons: ["whey", "vegan protein", "creatine", "peanut butter", "chia seeds"],
  },
];
