import { describe, expect, it } from "vitest";
import { buildPopupHtml } from "./mapPopup";
import { makeResult } from "./testing/fixtures";

describe("buildPopupHtml", () => {
  it("escapes text and shows the distance when present", () => {
    expect(buildPopupHtml(makeResult({ id: 5, name: "Haus <Linde> & Co", distance_km: 7.46 }))).toBe(
      '<div class="popup-content"><b>Haus &lt;Linde&gt; &amp; Co</b><br>Teststadt<br>Freie Plätze: 1<br>Wohngruppe' +
        '<br>Entfernung: 7.5 km<button class="popup-details" type="button" data-action="details" data-id="5">' +
        "Details anzeigen</button></div>",
    );
  });

  it("omits the distance outside a radius search", () => {
    expect(buildPopupHtml(makeResult())).not.toContain("Entfernung");
  });
});
