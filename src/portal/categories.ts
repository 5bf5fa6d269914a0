import { Category } from "../config/phaseRegistry";
import { SummaryMapping } from "../engine/identity";

export type ColumnKind = "text" | "flag";

export interface ListColumn {
  field: string;
  cell: number;
  kind: ColumnKind;
}

/** A link in a list row: the cell to search (or the whole row) and selectors tried in order. */
export interface ListLink {
  field: string;
  cell: number | null;
  selectors: string[];
}

/**
 * fields: label/value rows and key/value tables.
 * grid: a Kendo grid; a panel without one fails.
 * items: a grid when present, otherwise tag or list item texts.
 * auto: a grid when present, otherwise fields.
 */
export type SectionShape = "fields" | "grid" | "items" | "auto";

export interface DetailSection {
  name: string;
  /** 1-based position in the page's panel bar. */
  panel: number;
  shape: SectionShape;
}

export interface CategoryLayout {
  category: Category;
  minCells: number;
  columns: ListColumn[];
  links: ListLink[];
  mapping: SummaryMapping;
  sections: DetailSection[];
}

const text = (field: string, cell: number): ListColumn => ({ field, cell, kind: "text" });
const flag = (field: string, cell: number): ListColumn => ({ field, cell, kind: "flag" });

const experts: CategoryLayout = {
  category: "experts",
  minCells: 9,
  columns: [
    text("Expert_ID", 1),
    text("Facility", 4),
    text("Expert_Type", 6),
    text("Position", 7),
    text("Name", 8)
  ],
  links: [
    { field: "Manage_URL", cell: null, selectors: ["a[title='View Full Details']"] },
    { field: "Profile_URL", cell: null, selectors: ["a[title='View Profile']"] }
  ],
  mapping: { idField: "Expert_ID", urlField: "Manage_URL", requiredField: "Name" },
  sections: [
    { name: "General_Information", panel: 1, shape: "fields" },
    { name: "Details", panel: 2, shape: "fields" },
    { name: "Expert_Demographics", panel: 3, shape: "fields" },
    { name: "Expertise", panel: 4, shape: "grid" },
    { name: "Price_Availability", panel: 5, shape: "fields" },
    { name: "Facility_Affiliation", panel: 6, shape: "grid" },
    { name: "Web_Presence", panel: 8, shape: "grid" },
    { name: "OCIP_Activity", panel: 9, shape: "grid" },
    { name: "Audit_Trail", panel: 10, shape: "fields" }
  ]
};

const facilities: CategoryLayout = {
  category: "facilities",
  minCells: 16,
  columns: [text("Facility_ID", 1), text("Facility_Name", 3), text("Type", 4)],
  links: [
    {
      field: "Manage_URL",
      cell: 15,
      selectors: ["a", "a[href*='Details']", "a[title='View Full Details']"]
    }
  ],
  mapping: { idField: "Facility_ID", urlField: "Manage_URL", requiredField: null },
  sections: [
    { name: "General_Information", panel: 1, shape: "fields" },
    { name: "Academic_Unit_Details", panel: 2, shape: "fields" },
    { name: "Provinces_Served", panel: 3, shape: "items" },
    { name: "Activities_Offered", panel: 4, shape: "items" },
    { name: "Sectors_Served", panel: 5, shape: "items" },
    { name: "Contacts", panel: 6, shape: "grid" },
    { name: "Locations", panel: 7, shape: "auto" },
    { name: "Facility_Descriptors", panel: 8, shape: "auto" },
    { name: "Languages_Serviced", panel: 9, shape: "items" },
    { name: "Web_Presence", panel: 10, shape: "grid" },
    { name: "OCIP_Activity", panel: 11, shape: "auto" },
    { name: "Audit_Trail", panel: 12, shape: "fields" }
  ]
};

const organizations: CategoryLayout = {
  category: "organizations",
  minCells: 10,
  columns: [
    text("Organization_Name", 3),
    text("Provinces", 4),
    text("Sectors", 5),
    flag("Requests", 6),
    flag("Projects", 7),
    flag("Enabled", 8)
  ],
  links: [{ field: "Manage_URL", cell: 9, selectors: ["a"] }],
  mapping: { idField: null, urlField: "Manage_URL", requiredField: "Organization_Name" },
  sections: [
    { name: "General_Information", panel: 1, shape: "fields" },
    { name: "Organization_Information", panel: 2, shape: "auto" },
    { name: "Annual_Information", panel: 3, shape: "auto" },
    { name: "NAICS_Sectors", panel: 4, shape: "items" },
    { name: "Contacts", panel: 5, shape: "grid" },
    { name: "Locations", panel: 6, shape: "auto" },
    { name: "Languages_Serviced", panel: 7, shape: "items" },
    { name: "Web_Presence", panel: 8, shape: "grid" },
    { name: "OCIP_Activity", panel: 9, shape: "auto" },
    { name: "Audit_Trail", panel: 10, shape: "auto" }
  ]
};

const LAYOUTS: Record<Category, CategoryLayout> = { experts, facilities, organizations };

export function layoutFor(category: Category): CategoryLayout {
  return LAYOUTS[category];
}

export function sectionNames(layout: CategoryLayout): string[] {
  return layout.sections.map((section) => section.name);
}
