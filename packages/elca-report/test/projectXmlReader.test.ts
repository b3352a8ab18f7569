// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { describe, expect, test } from "@rstest/core";
import { ProjectXmlError, ProjectXmlReader } from "../src/projectXmlReader";
import { STRAW_WALL_PROJECT } from "./fixtures";

describe("ProjectXmlReader", () => {
    test("should key components by element and component uuid", () => {
        const lookup = ProjectXmlReader.parse(STRAW_WALL_PROJECT);

        expect(lookup.size).toBe(1);
        expect(lookup.get("e1_c1")).toEqual({
            key: "e1_c1",
            element: {
                uuid: "e1",
                name: "Strohballen - Holz",
                description: "Außenwand mit Strohdämmung",
                din276Code: "331",
                quantity: "200",
                refUnit: "m2",
            },
            component: {
                uuid: "c1",
                isLayer: true,
                processConfigUuid: "pc-1",
                processConfigName: "Stroh",
                layerSize: 180,
                lifeTime: 50,
                calcLca: true,
                isExtant: false,
                layerPosition: 2,
                layerAreaRatio: 1,
            },
        });
    });

    test("should also key components by bare name", () => {
        const lookup = ProjectXmlReader.parse(STRAW_WALL_PROJECT);

        expect(lookup.get("Stroh")?.key).toBe("e1_c1");
        expect(lookup.getByName("Stroh")?.component.layerSize).toBe(180);
        expect(lookup.names()).toEqual(["Stroh"]);
    });

    test("should skip components with an unreadable layer size", () => {
        const lookup = ProjectXmlReader.parse(STRAW_WALL_PROJECT);

        expect(lookup.get("e1_c2")).toBeUndefined();
        expect(lookup.getByName("Lehmputz")).toBeUndefined();
        expect(lookup.skipped).toEqual([
            { elementUuid: "e1", component: "c2", layerSize: "N/A", reason: "invalid layerSize" },
        ]);
    });

    test("should skip elements without uuid", () => {
        const lookup = ProjectXmlReader.parse(STRAW_WALL_PROJECT);

        expect(lookup.getByName("Ohne Element")).toBeUndefined();
        expect(lookup.entries().map((x) => x.key)).toEqual(["e1_c1"]);
    });

    test("should let the last component with a name win", () => {
        const xml = `<elca xmlns="https://www.bauteileditor.de">
            <element uuid="e1"><component uuid="c1" processConfigName="Stroh" layerSize="180"/></element>
            <element uuid="e2"><component uuid="c3" processConfigName="Stroh" layerSize="400"/></element>
        </elca>`;

        const lookup = ProjectXmlReader.parse(xml);

        expect(lookup.size).toBe(2);
        expect(lookup.getByName("Stroh")?.key).toBe("e2_c3");
        expect(lookup.getByKey("e1", "c1")?.component.layerSize).toBe(180);
        expect(lookup.overwrittenNames).toEqual([{ name: "Stroh", previous: "e1_c1", current: "e2_c3" }]);
    });

    test("should find elements and components at any depth", () => {
        const xml = `<e:elca xmlns:e="https://www.bauteileditor.de">
            <e:project><e:variant><e:elements>
                <e:element uuid="e5">
                    <e:layers><e:group><e:component uuid="c5" layerSize="20"/></e:group></e:layers>
                </e:element>
            </e:elements></e:variant></e:project>
        </e:elca>`;

        const lookup = ProjectXmlReader.parse(xml);

        expect(lookup.get("e5_c5")?.component.layerSize).toBe(20);
    });

    test("should fall back to name and position for components without uuid", () => {
        const xml = `<elca>
            <element uuid="e7">
                <component processConfigName="Holz" layerSize="24"/>
                <component layerSize="12.5"/>
                <component uuid="c8"/>
            </element>
        </elca>`;

        const lookup = ProjectXmlReader.parse(xml);

        expect(lookup.get("e7_Holz")?.component.layerSize).toBe(24);
        expect(lookup.get("e7_component-1")?.component.layerSize).toBe(12.5);
        expect(lookup.skipped).toEqual([{ elementUuid: "e7", component: "c8", reason: "missing layerSize" }]);
    });

    test("should reject malformed documents", () => {
        const xml = `<elca><element uuid="e1"></elca>`;

        expect(() => ProjectXmlReader.parse(xml)).toThrow(ProjectXmlError);
        try {
            ProjectXmlReader.parse(xml);
        } catch (e) {
            expect(e instanceof ProjectXmlError && e.line).toBe(1);
        }
    });

    test("should reject a missing file", () => {
        expect(() => ProjectXmlReader.parseFile("/nonexistent/project.xml")).toThrow(
            "Project XML file not found: /nonexistent/project.xml",
        );
    });
});
