import { NotFoundError } from "../../errors.js";
import { parseResultTable } from "../../extract/result-table.js";
import type { BrowserSession } from "../../backends/browser.js";
import type { VehicleRecord } from "../../types/valuation.js";
import type { PlateProvider } from "../resolver.js";
import type { PlateSite } from "../sites.js";

/** Submits the plate on a lookup site and reads its results table. */
export class BrowserFormPlateProvider implements PlateProvider {
  readonly name: string;

  constructor(private readonly session: BrowserSession, private readonly site: PlateSite) {
    this.name = site.name;
  }

  async lookup(plate: string, signal: AbortSignal): Promise<VehicleRecord> {
    const html = await this.session.submitForm(
      {
        url: this.site.url,
        inputSelector: this.site.inputSelector,
        submitSelector: this.site.submitSelector,
        resultSelector: this.site.resultSelector,
        value: plate,
      },
      signal,
    );

    const fields = parseResultTable(html, {
      tableSelector: this.site.tableSelector,
      sectionAware: this.site.sectionAware,
    });
    if (!fields.make && !fields.model && !fields.year) {
      throw new NotFoundError(`${this.site.name} shows no vehicle data for ${plate}`);
    }
    return { plate, found: true, ...fields };
  }
}
