import { EMERGENCY_TYPES, FALLBACK_EMERGENCY_TYPE, isEmergencyType, lookupProtocol } from "../protocols";

describe("protocol catalog", () => {
  it("defines exactly five emergency types", () => {
    expect(EMERGENCY_TYPES).toEqual([
      "cardiac_arrest",
      "choking",
      "possible_stroke",
      "anaphylaxis",
      "unconscious_but_breathing",
    ]);
    expect(isEmergencyType(FALLBACK_EMERGENCY_TYPE)).toBe(true);
  });

  it.each(EMERGENCY_TYPES)("returns a complete protocol for %s", (type) => {
    const result = lookupProtocol(type);
    if (!result.ok) throw new Error(`expected ${type} to resolve`);
    expect(result.emergencyType).toBe(type);
    expect(result.protocol.title.length).toBeGreaterThan(0);
    expect(result.protocol.steps.length).toBeGreaterThan(0);
    expect(result.protocol.stopCondition.length).toBeGreaterThan(0);
    result.protocol.steps.forEach((step, index) => {
      expect(step.startsWith(`${index + 1}. `)).toBe(true);
    });
  });

  it("has the documented step counts", () => {
    const counts = EMERGENCY_TYPES.map((type) => {
      const result = lookupProtocol(type);
      return result.ok ? result.protocol.steps.length : -1;
    });
    expect(counts).toEqual([5, 4, 5, 5, 5]);
  });

  it.each(["heart_attack", "", "Choking", "cardiac arrest"])("returns a tagged failure for %p", (type) => {
    expect(lookupProtocol(type)).toEqual({
      ok: false,
      error: "not_found",
      emergencyType: type,
      message: `Unknown emergency_type: ${type}.`,
    });
  });

  it("hands out frozen records", () => {
    const result = lookupProtocol("anaphylaxis");
    if (!result.ok) throw new Error("expected anaphylaxis to resolve");
    expect(Object.isFrozen(result.protocol)).toBe(true);
    expect(Object.isFrozen(result.protocol.steps)).toBe(true);
    expect(Object.isFrozen(result.protocol.notes)).toBe(true);
    expect(lookupProtocol("anaphylaxis")).toEqual(result);
  });
});
