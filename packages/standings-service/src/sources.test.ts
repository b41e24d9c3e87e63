import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";
import { ConfigurationMissingError } from "./errors.js";
import { createStandingsSource } from "./sources.js";

describe("createStandingsSource", () => {
  it("builds the source named by STANDINGS_SOURCE", () => {
    const api = createStandingsSource(loadConfig({ STANDINGS_API_TOKEN: "test-token" }, "/srv/pool"));
    const html = createStandingsSource(loadConfig({ STANDINGS_SOURCE: "html" }, "/srv/pool"));
    const fixed = createStandingsSource(loadConfig({ STANDINGS_SOURCE: "static" }, "/srv/pool"));

    expect([api.kind, html.kind, fixed.kind]).toEqual(["api", "html", "static"]);
  });

  it("refuses the api source without a token", () => {
    expect(() => createStandingsSource(loadConfig({}, "/srv/pool"))).toThrow(ConfigurationMissingError);
  });
});
