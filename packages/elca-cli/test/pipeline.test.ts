// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeAll, beforeEach, describe, expect, test } from "@rstest/core";
import { LogLevel, Logger } from "elca-core";
import { IfcLibraryService } from "ifc-library-core";
import {
    buildLibrary,
    companionXmlPath,
    extractAssemblies,
    importLibrary,
    processDirectory,
    processReport,
    withExtension,
} from "../src/pipeline";
import { PROJECT_XML, REPORT_HTML, temporaryDirectory } from "./fixtures";

describe("pipeline", () => {
    let dir: ReturnType<typeof temporaryDirectory>;
    let reportPath: string;

    beforeAll(() => {
        Logger.level = LogLevel.Silent;
    });

    beforeEach(() => {
        dir = temporaryDirectory();
        reportPath = join(dir.path, "wand.html");
        writeFileSync(reportPath, REPORT_HTML);
    });

    afterEach(() => {
        dir.dispose();
    });

    test("should derive output paths from the input path", () => {
        expect(withExtension("/data/wand.html", ".ifc")).toBe("/data/wand.ifc");
        expect(withExtension("/data/wand.html", ".summary.csv")).toBe("/data/wand.summary.csv");
        expect(companionXmlPath("/data/wand.htm")).toBe("/data/wand.xml");
    });

    test("should count assemblies and components", () => {
        const result = extractAssemblies(reportPath);

        expect(result.isOk).toBe(true);
        if (!result.isOk) return;
        expect(result.value.assemblyCount).toBe(1);
        expect(result.value.componentCount).toBe(2);
        expect(result.value.xmlPath).toBeUndefined();
        expect(result.value.assemblies[0].components[1].thickness).toBeUndefined();
    });

    test("should pick up the project export beside the report", () => {
        writeFileSync(join(dir.path, "wand.xml"), PROJECT_XML);

        const result = extractAssemblies(reportPath);

        expect(result.isOk).toBe(true);
        if (!result.isOk) return;
        expect(result.value.xmlPath).toBe(join(dir.path, "wand.xml"));
        expect(result.value.assemblies[0].components[1].thickness).toBe(0.18);
    });

    test("should keep report data when the project export is broken", () => {
        const xmlPath = join(dir.path, "kaputt.xml");
        writeFileSync(xmlPath, "<elca><element></elca>");

        const result = extractAssemblies(reportPath, { xmlPath });

        expect(result.isOk).toBe(true);
        if (!result.isOk) return;
        expect(result.value.assemblyCount).toBe(1);
        expect(result.value.xmlError?.startsWith("Malformed project XML: ")).toBe(true);
    });

    test("should fail for a missing report", () => {
        const missing = join(dir.path, "fehlt.html");

        expect(extractAssemblies(missing)).toEqual({ isOk: false, error: `Report file not found: ${missing}` });
    });

    test("should write the library and tables", () => {
        const result = processReport(reportPath, { summary: true });

        expect(result.isOk).toBe(true);
        if (!result.isOk) return;
        expect(result.value).toEqual({
            reportPath,
            ifcPath: join(dir.path, "wand.ifc"),
            csvPath: join(dir.path, "wand.csv"),
            summaryPath: join(dir.path, "wand.summary.csv"),
            assemblyCount: 1,
            componentCount: 2,
            layerSetCount: 1,
            failures: [],
        });

        const sets = IfcLibraryService.layerSets(readFileSync(result.value.ifcPath, "utf-8"));
        expect(sets.map((x) => x.layers.map((layer) => layer.thickness))).toEqual([[0.015, 0.36]]);
        expect(sets[0].library).toBe("wand");

        const summary = readFileSync(join(dir.path, "wand.summary.csv"), "utf-8").split("\n");
        expect(summary[0]).toBe(
            "Category Code,Category Name,Subcategory,Bauteil Name,Bauteil URL,Menge,Component Count,Process Count",
        );
        expect(summary[1]).toBe("331,Tragende Außenwände,Außenwände,Strohballen - Holz,/elements/42/,\"200,00 m²\",2,0");
    });

    test("should fail when the library cannot be written", () => {
        const extraction = extractAssemblies(reportPath);
        if (!extraction.isOk) throw new Error(extraction.error);
        const outputPath = join(dir.path, "fehlt", "wand.ifc");

        const result = buildLibrary(extraction.value.assemblies, outputPath);

        expect(result.isOk).toBe(false);
        expect(!result.isOk && result.error.startsWith(`Cannot write IFC library to ${outputPath}: `)).toBe(true);
    });

    test("should import a library into another file", () => {
        const libraryPath = join(dir.path, "bibliothek.ifc");
        const targetPath = join(dir.path, "ziel.ifc");
        const outputPath = join(dir.path, "ziel.merged.ifc");
        const extraction = extractAssemblies(reportPath);
        if (!extraction.isOk) throw new Error(extraction.error);
        buildLibrary(extraction.value.assemblies, libraryPath);
        buildLibrary([], targetPath);

        const first = importLibrary(libraryPath, targetPath, outputPath);
        const second = importLibrary(libraryPath, outputPath, join(dir.path, "zweimal.ifc"));

        expect(first).toEqual({
            isOk: true,
            value: { path: outputPath, imported: ["Strohballen - Holz"], skipped: [] },
        });
        expect(second.isOk && second.value.skipped).toEqual(["Strohballen - Holz"]);
        expect(importLibrary(join(dir.path, "fehlt.ifc"), targetPath, outputPath)).toEqual({
            isOk: false,
            error: `Library file not found: ${join(dir.path, "fehlt.ifc")}`,
        });
    });

    test("should refuse to import into a file of another schema", () => {
        const libraryPath = join(dir.path, "bibliothek.ifc");
        const targetPath = join(dir.path, "alt.ifc");
        const extraction = extractAssemblies(reportPath);
        if (!extraction.isOk) throw new Error(extraction.error);
        buildLibrary(extraction.value.assemblies, libraryPath);
        writeFileSync(targetPath, "ISO-10303-21;\nHEADER;\nFILE_SCHEMA(('IFC2X3'));\nENDSEC;\nDATA;\nENDSEC;\n");

        const result = importLibrary(libraryPath, targetPath, join(dir.path, "alt.merged.ifc"));

        expect(result).toEqual({
            isOk: false,
            error: "Cannot import into a IFC2X3 file, only IFC4 targets are supported",
        });
        expect(existsSync(join(dir.path, "alt.merged.ifc"))).toBe(false);
    });

    test("should process a directory and isolate failures", () => {
        writeFileSync(join(dir.path, "dach.html"), REPORT_HTML);
        mkdirSync(join(dir.path, "dach.ifc"));
        mkdirSync(join(dir.path, "unter"));
        writeFileSync(join(dir.path, "unter", "decke.html"), REPORT_HTML);

        const flat = processDirectory(dir.path);

        expect(flat.isOk).toBe(true);
        if (!flat.isOk) return;
        expect(flat.value.entries.map((x) => x.reportPath)).toEqual([
            join(dir.path, "dach.html"),
            join(dir.path, "wand.html"),
        ]);
        expect(flat.value.succeeded).toBe(1);
        expect(flat.value.failed).toBe(1);
        expect(existsSync(join(dir.path, "wand.ifc"))).toBe(true);

        const nested = processDirectory(dir.path, { recursive: true, outputDirectory: join(dir.path, "out") });
        expect(nested.isOk && nested.value.succeeded).toBe(3);
        expect(existsSync(join(dir.path, "out", "unter", "decke.ifc"))).toBe(true);
    });

    test("should fail for a directory without reports", () => {
        const empty = join(dir.path, "leer");
        mkdirSync(empty);

        expect(processDirectory(empty)).toEqual({ isOk: false, error: `No HTML reports found in ${empty}` });
        expect(processDirectory(join(dir.path, "fehlt"))).toEqual({
            isOk: false,
            error: `Directory not found: ${join(dir.path, "fehlt")}`,
        });
    });
});
