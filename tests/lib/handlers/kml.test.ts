/**
 * Tests for KML documents.
 */

import { expect, test } from "@playwright/test";
import { kmlHandler } from "@/lib/handlers";
import { processXml } from "@/lib/xml";
import { parseXml } from "@/lib/xml/document";

const PLACES = `<kml xmlns="http://www.opengis.net/kml/2.2">
  <Document>
    <name>Places</name>
    <Style id="red"><LineStyle><color>ff0000ff</color></LineStyle></Style>
    <Placemark>
      <name>Home</name>
      <styleUrl>#red</styleUrl>
      <Point><coordinates>1,2</coordinates></Point>
    </Placemark>
    <Folder>
      <name>Trips</name>
      <Placemark>
        <name>Route</name>
        <LineString><coordinates>1,2 3,4</coordinates></LineString>
      </Placemark>
    </Folder>
  </Document>
</kml>`;

test.describe("KML handler", () => {
  test("detects the KML namespace", () => {
    expect(kmlHandler.detect(parseXml(PLACES)).score).toBe(1);
  });

  test("needs KML features without a namespace", () => {
    expect(kmlHandler.detect(parseXml("<kml><Document/></kml>")).score).toBe(0);
    expect(
      kmlHandler.detect(parseXml("<kml><Document><Placemark/></Document></kml>"))
        .score
    ).toBeCloseTo(0.4, 6);
  });

  test("summarises placemarks and geometries", () => {
    expect(processXml(PLACES).summary.fields).toEqual({
      name: "Places",
      folderCount: 1,
      placemarkCount: 2,
      placemarks: ["Home", "Route"],
      geometries: { Point: 1, LineString: 1 },
      styleCount: 1,
    });
  });

  test("placemarks link to their style", () => {
    const { chunks } = processXml(PLACES);

    expect(chunks.map((c) => [c.kind, c.identifier])).toEqual([
      ["context", undefined],
      ["style", "red"],
      ["placemark", "Home"],
      ["folder", "Trips"],
    ]);
    expect(chunks[2]?.references).toEqual({ style: [1] });
    expect(chunks[1]?.referencedBy).toEqual({ style: [2] });
  });
});
