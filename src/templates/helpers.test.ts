import { describe, it, expect } from "vitest";
import { linkRfc } from "../citations";
import { createHandlebars } from "./index";
import { renderValue, sectionTitle } from "./helpers";

const hbs = createHandlebars(linkRfc);

describe("renderValue", () => {
  it("links citations in strings", () => {
    expect(renderValue("See RFC 7489", linkRfc, hbs)).toBe(
      'See <a href="https://datatracker.ietf.org/doc/html/rfc7489">RFC 7489</a>',
    );
  });

  it("renders objects and arrays as nested lists", () => {
    expect(
      renderValue({ policy: "reject", pct: 100, tags: ["p", "rua"] }, linkRfc, hbs),
    ).toBe(
      "<dl><dt>policy</dt><dd>reject</dd><dt>pct</dt><dd>100</dd>" +
        "<dt>tags</dt><dd><ul><li>p</li><li>rua</li></ul></dd></dl>",
    );
  });

  it("escapes keys", () => {
    expect(renderValue({ "<k>": 1 }, linkRfc, hbs)).toBe(
      "<dl><dt>&lt;k&gt;</dt><dd>1</dd></dl>",
    );
  });

  it("renders scalars", () => {
    expect(renderValue(null, linkRfc, hbs)).toBe("");
    expect(renderValue(true, linkRfc, hbs)).toBe("true");
  });
});

describe("sectionTitle", () => {
  it("upper-cases check names", () => {
    expect(sectionTitle("soa")).toBe("SOA");
    expect(sectionTitle("mta_sts")).toBe("MTA-STS");
    expect(sectionTitle("tls-rpt")).toBe("TLS-RPT");
  });
});

describe("template helpers", () => {
  it("links citations without escaping the generated anchors", () => {
    const template = hbs.compile("{{linkRfc text}}");
    expect(template({ text: "RFC 5322 <b>" })).toBe(
      '<a href="https://datatracker.ietf.org/doc/html/rfc5322">RFC 5322</a> &lt;b&gt;',
    );
  });

  it("renders nothing for a missing value", () => {
    expect(hbs.compile("[{{linkRfc missing}}]")({})).toBe("[]");
  });

  it("escapes JSON dumps", () => {
    expect(hbs.compile("{{json value}}")({ value: { a: "<" } })).toBe(
      '{\n  &quot;a&quot;: &quot;&lt;&quot;\n}',
    );
  });
});
