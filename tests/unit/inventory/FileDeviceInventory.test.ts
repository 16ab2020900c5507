/**
 * FileDeviceInventory Unit Tests
 */

import { promises as fs } from "fs"
import os from "os"
import path from "path"
import { FileDeviceInventory, parseInventory } from "../../../src/infrastructure/inventory/FileDeviceInventory"
import { ValidationError } from "../../../src/shared/errors"

describe("parseInventory", () => {
  it("should group devices by plant", () => {
    const inventory = parseInventory({
      plants: {
        Riverside: [
          { serial: "INV-A", entityId: "1001" },
          { serial: "INV-B", entityId: 1002 },
        ],
        Hillside: [],
      },
    })

    expect([...inventory.keys()]).toEqual(["Riverside", "Hillside"])
    expect(inventory.get("Riverside")).toEqual([
      { serial: "INV-A", plant: "Riverside", entityId: "1001" },
      { serial: "INV-B", plant: "Riverside", entityId: "1002" },
    ])
    expect(inventory.get("Hillside")).toEqual([])
  })

  it("should reject a document without plants", () => {
    expect(() => parseInventory({ devices: [] })).toThrow(ValidationError)
    expect(() => parseInventory(null)).toThrow(ValidationError)
  })

  it("should reject a device without serial", () => {
    expect(() => parseInventory({ plants: { Riverside: [{ entityId: "1" }] } })).toThrow(
      "Every device of plant Riverside needs a serial"
    )
  })

  it("should reject a device without entity id", () => {
    expect(() => parseInventory({ plants: { Riverside: [{ serial: "INV-A" }] } })).toThrow(
      "Device INV-A of plant Riverside needs an entityId"
    )
  })

  it("should reject a serial listed twice in one plant", () => {
    expect(() =>
      parseInventory({
        plants: {
          Riverside: [
            { serial: "INV-A", entityId: "1" },
            { serial: "INV-A", entityId: "2" },
          ],
        },
      })
    ).toThrow("Device INV-A is listed twice in plant Riverside")
  })
})

describe("FileDeviceInventory", () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "inventory-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it("should load the inventory file", async () => {
    const filePath = path.join(dir, "devices.json")
    await fs.writeFile(filePath, JSON.stringify({ plants: { Riverside: [{ serial: "INV-A", entityId: "1" }] } }))

    const inventory = await new FileDeviceInventory(filePath).load()

    expect(inventory.get("Riverside")).toEqual([{ serial: "INV-A", plant: "Riverside", entityId: "1" }])
  })

  it("should fail when the file is missing", async () => {
    await expect(new FileDeviceInventory(path.join(dir, "missing.json")).load()).rejects.toThrow(ValidationError)
  })
})
