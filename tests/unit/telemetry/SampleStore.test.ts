/**
 * Sample Store Unit Tests
 */

import {
  ingest,
  lastPresent,
  parsePowerValue,
  presentSamples,
} from "../../../src/application/telemetry/SampleStore"
import { bkk } from "../../support/fixtures"

describe("SampleStore", () => {
  describe("ingest", () => {
    it("should return an empty series for empty input", () => {
      expect(ingest([])).toEqual([])
    })

    it("should sort by time, coerce values and drop entries without an epoch", () => {
      const series = ingest([
        { start: bkk(10, 15), value: "1200.5", units: "W" },
        { start: bkk(10, 0), value: 1000, units: "W" },
        { start: bkk(10, 30), value: "" },
        { start: null, value: 5, units: "W" },
        { value: 7, units: "W" },
        { start: bkk(10, 45), value: "n/a", units: "W" },
      ])

      expect(series.map((s) => s.epoch)).toEqual([bkk(10, 0), bkk(10, 15), bkk(10, 30), bkk(10, 45)])
      expect(series.map((s) => s.value)).toEqual([1000, 1200.5, null, null])
      expect(series.map((s) => s.units)).toEqual(["W", "W", "", "W"])
    })

    it("should render timestamps in the plant zone with an explicit offset", () => {
      const [sample] = ingest([{ start: bkk(10, 0), value: 1000, units: "W" }])

      expect(sample.timestamp).toBe("2025-04-30T10:00:00+07:00")
    })

    it("should keep zero as a reading", () => {
      const [sample] = ingest([{ start: bkk(10, 0), value: 0, units: "W" }])

      expect(sample.value).toBe(0)
    })

    it("should keep the last entry for a repeated epoch", () => {
      const series = ingest([
        { start: bkk(10, 0), value: 1000, units: "W" },
        { start: bkk(10, 0), value: 2500, units: "W" },
      ])

      expect(series).toHaveLength(1)
      expect(series[0].value).toBe(2500)
    })

    it("should accept numeric string epochs", () => {
      const series = ingest([{ start: String(bkk(10, 0)), value: 1000, units: "W" }])

      expect(series[0].epoch).toBe(bkk(10, 0))
    })

    it("should null a reading that follows a gap of more than 15 minutes and keep its row", () => {
      const series = ingest([
        { start: bkk(10, 0), value: 1000, units: "W" },
        { start: bkk(10, 15), value: null, units: "W" },
        { start: bkk(10, 30), value: 2000, units: "W" },
      ])

      expect(series).toHaveLength(3)
      expect(series.map((s) => s.value)).toEqual([1000, null, null])
      expect(series[2].timestamp).toBe("2025-04-30T10:30:00+07:00")
    })

    it("should measure the next gap from the nulled reading", () => {
      const series = ingest([
        { start: bkk(10, 0), value: 1000, units: "W" },
        { start: bkk(10, 30), value: 2000, units: "W" },
        { start: bkk(10, 45), value: 3000, units: "W" },
      ])

      expect(series.map((s) => s.value)).toEqual([1000, null, 3000])
    })

    it("should not split readings exactly 15 minutes apart", () => {
      const series = ingest([
        { start: bkk(10, 0), value: 1000, units: "W" },
        { start: bkk(10, 15), value: 2000, units: "W" },
      ])

      expect(series.map((s) => s.value)).toEqual([1000, 2000])
    })
  })

  describe("parsePowerValue", () => {
    it("should treat non-numeric input as missing", () => {
      expect(parsePowerValue(undefined)).toBeNull()
      expect(parsePowerValue(null)).toBeNull()
      expect(parsePowerValue("  ")).toBeNull()
      expect(parsePowerValue(Number.NaN)).toBeNull()
      expect(parsePowerValue({ value: 1 })).toBeNull()
      expect(parsePowerValue(" 42 ")).toBe(42)
    })
  })

  describe("presentSamples / lastPresent", () => {
    it("should skip missing readings", () => {
      const series = ingest([
        { start: bkk(10, 0), value: 1000, units: "W" },
        { start: bkk(10, 15), value: 1500, units: "W" },
        { start: bkk(10, 30), value: null, units: "W" },
      ])

      expect(presentSamples(series).map((s) => s.value)).toEqual([1000, 1500])
      expect(lastPresent(series)?.epoch).toBe(bkk(10, 15))
      expect(lastPresent([])).toBeNull()
    })
  })
})
