import { test } from "./lib/base-url";
import { expect } from "@playwright/test";

test("renders the simulation controls and canvas", async ({ page }) => {
  await page.goto("/");
  await expect(page.getByText("Speed:")).toBeVisible();
  await expect(page.getByText("Seed:")).toBeVisible();
  await expect(page.locator("canvas")).toBeVisible();
});

test("3D arena view is the default", async ({ page }) => {
  await page.goto("/");
  const viewSelect = page.locator("select").filter({ hasText: "3D Arena" });
  await expect(viewSelect).toHaveValue("scene");
  await expect(page.locator("canvas")).toBeVisible();
});

test("view toggle switches between the arena and the cursor slice", async ({ page }) => {
  await page.goto("/");
  const viewSelect = page.locator("select").filter({ hasText: "3D Arena" });

  await viewSelect.selectOption("slice");
  await expect(page.locator("canvas")).toBeVisible();

  await viewSelect.selectOption("scene");
  await expect(page.locator("canvas")).toBeVisible();
});

test("keyboard pauses the simulation", async ({ page }) => {
  await page.goto("/?preset=empty");
  await expect(page.getByRole("button", { name: "Pause" })).toBeVisible();
  await page.keyboard.press("p");
  await expect(page.getByRole("button", { name: "Play" })).toBeVisible();
});
