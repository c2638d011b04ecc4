import { describe, expect, it } from "vitest";
import { InMemoryCustody } from "../../src/crowdfunding/custody.js";
import { errorCodeOf } from "../helpers/errors.js";
import { identity } from "../helpers/participants.js";

describe("in-memory custody", () => {
  const donor = identity(10);
  const recipient = identity(3);

  it("pays out of deposited funds", async () => {
    const custody = new InMemoryCustody();
    custody.deposit(donor, 80n);
    custody.deposit(donor, 20n);

    const result = await custody.transfer({ recipient, amount: 60n, campaignIndex: 0 });

    expect(result.status).toBe("confirmed");
    expect(custody.getHeld()).toBe(40n);
    expect(custody.getDeposited(donor)).toBe(100n);
    expect(custody.getPaidTo(recipient)).toBe(60n);
    expect(custody.getPayouts()).toEqual([
      expect.objectContaining({ recipient, amount: 60n, campaignIndex: 0 })
    ]);
  });

  it("refuses to pay more than it holds", async () => {
    const custody = new InMemoryCustody();
    custody.deposit(donor, 10n);

    const result = await custody.transfer({ recipient, amount: 11n, campaignIndex: 2 });

    expect(result).toEqual({
      status: "failed",
      reason: "Insufficient custody balance: holding 10, asked for 11"
    });
    expect(custody.getHeld()).toBe(10n);
  });

  it("fails only the next transfer when told to", async () => {
    const custody = new InMemoryCustody();
    custody.deposit(donor, 10n);
    custody.failNextTransfer("maintenance");

    expect(await custody.transfer({ recipient, amount: 5n, campaignIndex: 0 })).toEqual({
      status: "failed",
      reason: "maintenance"
    });
    expect((await custody.transfer({ recipient, amount: 5n, campaignIndex: 0 })).status).toBe("confirmed");
  });

  it("rejects negative deposits", () => {
    const custody = new InMemoryCustody();

    expect(errorCodeOf(() => custody.deposit(donor, -1n))).toBe("InvalidArgument");
    expect(custody.getHeld()).toBe(0n);
  });

  it("moves nothing once the caller has aborted", async () => {
    const custody = new InMemoryCustody();
    custody.deposit(donor, 30n);
    const controller = new AbortController();
    controller.abort();

    const result = await custody.transfer({ recipient, amount: 30n, campaignIndex: 1, signal: controller.signal });

    expect(result).toEqual({ status: "failed", reason: "cancelled before sending" });
    expect(custody.getHeld()).toBe(30n);
    expect(custody.getPayouts()).toHaveLength(0);
  });

  it("records a payout without the abort signal", async () => {
    const custody = new InMemoryCustody();
    custody.deposit(donor, 5n);

    await custody.transfer({ recipient, amount: 5n, campaignIndex: 4, signal: new AbortController().signal });

    expect(custody.getPayouts()[0]).toEqual({
      reference: expect.any(String),
      recipient,
      amount: 5n,
      campaignIndex: 4
    });
  });
});
