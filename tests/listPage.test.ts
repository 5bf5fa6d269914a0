import { describe, expect, it } from "vitest";
import { readFileSync } from "fs";
import path from "path";
import { layoutFor } from "../src/portal/categories";
import { parseInstitutionOptions, parseListPage, parsePagerInfo } from "../src/portal/listPage";

const fixturesDir = path.join(process.cwd(), "fixtures");

describe("parseListPage", () => {
  it("maps expert rows by column position", () => {
    const html = readFileSync(path.join(fixturesDir, "experts_list.html"), "utf8");

    const page = parseListPage(html, layoutFor("experts"), "https://www.ocip.express/ExpertAdmin/Index");

    expect(page.rows).toEqual([
      {
        Expert_ID: "101",
        Facility: "Robotics Lab",
        Expert_Type: "Faculty",
        Position: "Professor",
        Name: "Ada Lovelace",
        Manage_URL: "https://www.ocip.express/ExpertAdmin/Details/101",
        Profile_URL: "https://www.ocip.express/Profile/101"
      },
      {
        Expert_ID: "102",
        Facility: "Optics Facility",
        Expert_Type: "Staff",
        Position: "Technician",
        Name: "Grace Hopper",
        Manage_URL: "Not Found",
        Profile_URL: "Not Found"
      }
    ]);
    expect(page.pager).toEqual({ start: 1, end: 2, total: 4 });
    expect(page.hasNextPage).toBe(true);
  });

  it("reads flag columns and stops on the last page", () => {
    const html = readFileSync(path.join(fixturesDir, "organizations_list.html"), "utf8");

    const page = parseListPage(
      html,
      layoutFor("organizations"),
      "https://www.ocip.express/BusinessAdmin/Index"
    );

    expect(page.rows).toEqual([
      {
        Organization_Name: "Acme Robotics",
        Provinces: "Ontario, Quebec",
        Sectors: "Manufacturing",
        Requests: "Yes",
        Projects: "No",
        Enabled: "Yes",
        Manage_URL: "https://www.ocip.express/BusinessAdmin/Details?id=7"
      }
    ]);
    expect(page.hasNextPage).toBe(false);
  });

  it("treats a disabled next button as the end when there is no pager text", () => {
    const html = `<div class="k-pager"><a class="k-pager-nav k-disabled" aria-label="Go to the next page"></a></div>`;

    const page = parseListPage(html, layoutFor("experts"), "https://www.ocip.express/");

    expect(page.rows).toEqual([]);
    expect(page.pager).toBeNull();
    expect(page.hasNextPage).toBe(false);
  });
});

describe("parsePagerInfo", () => {
  it("reads the item range", () => {
    expect(parsePagerInfo("101 - 163 of 163 items")).toEqual({ start: 101, end: 163, total: 163 });
  });

  it("reads an empty grid", () => {
    expect(parsePagerInfo("No items to display")).toEqual({ start: 0, end: 0, total: 0 });
  });

  it("returns null for anything else", () => {
    expect(parsePagerInfo("Loading")).toBeNull();
  });
});

describe("parseInstitutionOptions", () => {
  it("lists institutions without the placeholder", () => {
    const html = `
      <ul id="HeiId_listbox">
        <li>Select HEI...</li>
        <li> Lakeshore   University </li>
        <li></li>
        <li>Northern College</li>
      </ul>`;

    expect(parseInstitutionOptions(html)).toEqual(["Lakeshore University", "Northern College"]);
  });
});
