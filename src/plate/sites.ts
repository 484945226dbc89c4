/** Public plate lookup sites driven through a browser form. */

export interface PlateSite {
  name: string;
  url: string;
  inputSelector: string;
  submitSelector: string;
  /** Rendered once results are in. */
  resultSelector: string;
  tableSelector: string;
  /** The year label repeats outside the vehicle section on this site. */
  sectionAware: boolean;
}

export const PLATE_SITES = {
  patentechile: {
    name: "patentechile",
    url: "https://www.patentechile.com/",
    inputSelector: "#inputTerm",
    submitSelector: "#searchBtn",
    resultSelector: "#tbl-results",
    tableSelector: "#tbl-results",
    sectionAware: true,
  },
  volanteomaleta: {
    name: "volanteomaleta",
    url: "https://volanteomaleta.com/",
    inputSelector: "input[name='patente']",
    submitSelector: "button[type='submit']",
    resultSelector: "table",
    tableSelector: "table",
    sectionAware: false,
  },
} satisfies Record<string, PlateSite>;
