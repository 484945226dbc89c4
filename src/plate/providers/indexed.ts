import { NotFoundError } from "../../errors.js";
import type { VehicleRecord } from "../../types/valuation.js";
import type { PlateIndex } from "../plate-index.js";
import type { PlateProvider } from "../resolver.js";

export class IndexedPlateProvider implements PlateProvider {
  readonly name = "index";

  constructor(private readonly index: PlateIndex) {}

  async lookup(plate: string, signal: AbortSignal): Promise<VehicleRecord> {
    const entry = await this.index.get(plate, signal);
    if (!entry) throw new NotFoundError(`Plate ${plate} is not in the ${this.index.name} index`);
    return { plate, found: true, ...entry };
  }
}
