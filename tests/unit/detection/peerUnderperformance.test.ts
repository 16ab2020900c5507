/**
 * Peer Underperformance Rule Unit Tests
 */

import type { RuleContext } from "../../../src/application/detection/context"
import {
  evaluatePeerUnderperformance,
  latestReadings,
} from "../../../src/application/detection/peerUnderperformance"
import { DEFAULT_THRESHOLDS } from "../../../src/shared/config"
import type { Series } from "../../../src/domain/telemetry/Telemetry"
import { at, readings } from "../../support/fixtures"

describe("evaluatePeerUnderperformance", () => {
  const ctx: RuleContext = { now: at(12, 10), thresholds: DEFAULT_THRESHOLDS, timeZone: "Asia/Bangkok" }

  function plant(entries: Record<string, Series>): Map<string, Series> {
    return new Map(Object.entries(entries))
  }

  it("should flag an inverter under a quarter of the best one", () => {
    const outcomes = evaluatePeerUnderperformance(
      "Riverside",
      plant({
        A: readings(11, 45, [78000, 80000]),
        B: readings(11, 45, [16000, 15000]),
      }),
      ctx
    )

    expect(outcomes).toEqual([
      {
        key: { plant: "Riverside", scope: "A", kind: "underperforming" },
        candidate: null,
        recoveryMessage: "Riverside, inverter A is now performing normally at 80 kW.",
      },
      {
        key: { plant: "Riverside", scope: "B", kind: "underperforming" },
        candidate: {
          key: { plant: "Riverside", scope: "B", kind: "underperforming" },
          details: "value:15,time:2025-04-30 12:00",
          message: "Riverside, inverter B is underperforming with 15 kW.\nTime: 2025-04-30 12:00",
        },
        recoveryMessage: "Riverside, inverter B is now performing normally at 15 kW.",
      },
    ])
  })

  it("should not compare while the best inverter is at or under 50 kW", () => {
    const outcomes = evaluatePeerUnderperformance(
      "Riverside",
      plant({
        A: readings(12, 0, [40000]),
        B: readings(12, 0, [1000]),
      }),
      ctx
    )

    expect(outcomes).toEqual([])
  })

  it("should not flag an inverter at exactly a quarter of the best one", () => {
    const outcomes = evaluatePeerUnderperformance(
      "Riverside",
      plant({
        A: readings(12, 0, [80000]),
        B: readings(12, 0, [20000]),
      }),
      ctx
    )

    expect(outcomes.map((o) => o.candidate)).toEqual([null, null])
  })

  it("should only compare inverters that reported at the latest timestamp", () => {
    const outcomes = evaluatePeerUnderperformance(
      "Riverside",
      plant({
        A: readings(11, 45, [70000, 80000]),
        B: readings(11, 45, [9000, 10000]),
        C: readings(11, 30, [1000, 1000]),
      }),
      ctx
    )

    expect(outcomes.map((o) => o.key.scope)).toEqual(["A", "B"])
    expect(outcomes[1].candidate?.details).toBe("value:10,time:2025-04-30 12:00")
  })

  it("should abstain for a plant without readings", () => {
    expect(evaluatePeerUnderperformance("Riverside", plant({ A: [] }), ctx)).toEqual([])
  })

  describe("latestReadings", () => {
    it("should rank by value and break ties by serial", () => {
      const latest = latestReadings(
        plant({
          C: readings(12, 0, [60000]),
          B: readings(12, 0, [60000]),
          A: readings(12, 0, [30000]),
        })
      )

      expect(latest?.readings.map((r) => r.serial)).toEqual(["B", "C", "A"])
    })
  })
})
