/**
 * File Device Inventory
 *
 * Loads the monitored inverters from a JSON document:
 * { "plants": { "<plant name>": [{ "serial": "...", "entityId": "..." }] } }
 */

import { promises as fs } from "fs"
import type { Device, DeviceInventory, PlantInventory } from "../../domain/telemetry/Telemetry"
import { ValidationError, errorMessage } from "../../shared/errors"

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function parseInventory(document: unknown): PlantInventory {
  if (!isRecord(document) || !isRecord(document.plants)) {
    throw new ValidationError('Device inventory must be an object with a "plants" map', "plants")
  }

  const inventory = new Map<string, Device[]>()
  for (const [plant, rawDevices] of Object.entries(document.plants)) {
    if (!Array.isArray(rawDevices)) {
      throw new ValidationError(`Devices of plant ${plant} must be an array`, plant)
    }

    const devices: Device[] = []
    const seen = new Set<string>()
    for (const raw of rawDevices) {
      if (!isRecord(raw) || typeof raw.serial !== "string" || !raw.serial) {
        throw new ValidationError(`Every device of plant ${plant} needs a serial`, plant)
      }
      const entityId = raw.entityId
      if (typeof entityId !== "string" && typeof entityId !== "number") {
        throw new ValidationError(`Device ${raw.serial} of plant ${plant} needs an entityId`, raw.serial)
      }
      if (seen.has(raw.serial)) {
        throw new ValidationError(`Device ${raw.serial} is listed twice in plant ${plant}`, raw.serial)
      }
      seen.add(raw.serial)
      devices.push({ serial: raw.serial, plant, entityId: String(entityId) })
    }
    inventory.set(plant, devices)
  }
  return inventory
}

export class FileDeviceInventory implements DeviceInventory {
  constructor(private filePath: string) {}

  async load(): Promise<PlantInventory> {
    let document: unknown
    try {
      document = JSON.parse(await fs.readFile(this.filePath, "utf8"))
    } catch (error) {
      throw new ValidationError(`Cannot read device inventory ${this.filePath}: ${errorMessage(error)}`)
    }
    return parseInventory(document)
  }
}
