import { describe, test, expect } from "vitest";
import { DeploymentStatus } from "../deployment-status.js";
import { ErrIllegalTransition } from "../errors.js";

describe("DeploymentStatus", () => {
  test.each([
    ["deploying", "running"],
    ["deploying", "failed"],
    ["running", "stopping"],
    ["running", "cleaning"],
    ["running", "failed"],
    ["stopping", "stopped"],
    ["stopping", "running"],
    ["stopping", "failed"],
    ["stopped", "running"],
    ["stopped", "cleaning"],
    ["failed", "cleaning"],
    ["cleaning", "cleaned"],
  ] as const)("%s → %s is allowed", (from, to) => {
    expect(DeploymentStatus.canTransition(from, to)).toBe(true);
  });

  test.each([
    ["deploying", "stopped"],
    ["running", "running"],
    ["running", "stopped"],
    ["stopped", "stopping"],
    ["failed", "running"],
    ["cleaning", "running"],
    ["cleaned", "cleaning"],
    ["cleaned", "running"],
  ] as const)("%s → %s is illegal", (from, to) => {
    expect(DeploymentStatus.canTransition(from, to)).toBe(false);
    expect(() => DeploymentStatus.assertTransition("dep-x", from, to)).toThrow(
      `Deployment "dep-x" cannot move from ${from} to ${to}`,
    );
  });

  test("assertTransition() raises illegal_transition", () => {
    try {
      DeploymentStatus.assertTransition("dep-x", "cleaned", "cleaning");
      expect.unreachable();
    } catch (err) {
      expect(ErrIllegalTransition.is(err)).toBe(true);
    }
  });

  test("only cleaned is terminal", () => {
    expect(DeploymentStatus.all.filter(DeploymentStatus.isTerminal)).toEqual(["cleaned"]);
  });

  test("is() recognises status names", () => {
    expect(DeploymentStatus.is("stopping")).toBe(true);
    expect(DeploymentStatus.is("pending")).toBe(false);
  });
});
