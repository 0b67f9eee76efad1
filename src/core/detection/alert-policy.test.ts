import { describe, expect, it } from "vitest";
import { LastSoldRecord } from "../types/record";
import { type AlertPolicy, gradeRank, shouldAlert } from "./alert-policy";

const sale = (price: number, condition: string) =>
  new LastSoldRecord({
    title: "Test Card",
    price,
    condition,
    soldDate: "01/15/2024",
    url: "https://test.com/card1",
  });

const strict: AlertPolicy = {
  alertAllNewSales: false,
  maxPriceAlert: 50,
  minCondition: "Near Mint",
};

describe("alert policy", () => {
  it("should pass everything when alerting all new sales", () => {
    expect(
      shouldAlert(sale(500, "Damaged"), { ...strict, alertAllNewSales: true }),
    ).toBe(true);
  });

  it("should drop sales above the price ceiling", () => {
    expect(shouldAlert(sale(50, "Near Mint"), strict)).toBe(true);
    expect(shouldAlert(sale(50.01, "Near Mint"), strict)).toBe(false);
  });

  it("should drop grades below the minimum", () => {
    expect(shouldAlert(sale(10, "Mint"), strict)).toBe(true);
    expect(shouldAlert(sale(10, "NM"), strict)).toBe(true);
    expect(shouldAlert(sale(10, "Lightly Played"), strict)).toBe(false);
    expect(shouldAlert(sale(10, "DMG"), strict)).toBe(false);
  });

  it("should let labels that are not grades through", () => {
    expect(shouldAlert(sale(10, "Foil"), strict)).toBe(true);
    expect(shouldAlert(sale(10, "Unknown Condition"), strict)).toBe(true);
  });

  it("should rank abbreviations with their full names", () => {
    expect(gradeRank("LP")).toBe(gradeRank("Lightly Played"));
    expect(gradeRank("heavily played")).toBe(4);
    expect(gradeRank("Japanese")).toBeNull();
  });

  it("should not treat object property names as grades", () => {
    expect(gradeRank("constructor")).toBeNull();
    expect(gradeRank("toString")).toBeNull();
    expect(
      shouldAlert(sale(10, "Near Mint"), { ...strict, minCondition: "constructor" }),
    ).toBe(true);
  });
});
