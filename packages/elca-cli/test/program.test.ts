// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { existsSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "@rstest/core";
import { LogLevel, Logger } from "elca-core";
import { createProgram } from "../src/program";
import { PROJECT_XML, REPORT_HTML, temporaryDirectory } from "./fixtures";

describe("createProgram", () => {
    let dir: ReturnType<typeof temporaryDirectory>;
    let lines: string[];
    let exitCode: number | undefined;

    const run = (...args: string[]) => {
        const program = createProgram({
            out: (line) => lines.push(line),
            setExitCode: (code) => {
                exitCode = code;
            },
        });
        program.exitOverride();
        program.parse(["--log-level", "silent", ...args], { from: "user" });
    };

    beforeEach(() => {
        dir = temporaryDirectory();
        lines = [];
        exitCode = undefined;
        writeFileSync(join(dir.path, "wand.html"), REPORT_HTML);
    });

    afterEach(() => {
        dir.dispose();
        Logger.level = LogLevel.Info;
    });

    test("should extract a report and list the library", () => {
        run("extract", join(dir.path, "wand.html"), "--csv");

        expect(exitCode).toBeUndefined();
        expect(lines).toEqual([
            "1 assemblies, 2 components",
            `Library: ${join(dir.path, "wand.ifc")} (1 layer sets)`,
            `Components: ${join(dir.path, "wand.csv")}`,
        ]);

        lines = [];
        run("list", join(dir.path, "wand.ifc"));
        expect(lines).toEqual(["Strohballen - Holz: Lehmputz 0.015 m, Stroh 0.36 m"]);
    });

    test("should use an explicit project export and output", () => {
        writeFileSync(join(dir.path, "projekt.xml"), PROJECT_XML);
        const output = join(dir.path, "bibliothek.ifc");

        run("extract", join(dir.path, "wand.html"), "--xml", join(dir.path, "projekt.xml"), "-o", output);
        lines = [];
        run("list", output);

        expect(lines).toEqual(["Strohballen - Holz: Lehmputz 0.015 m, Stroh 0.18 m"]);
    });

    test("should import into another file", () => {
        run("extract", join(dir.path, "wand.html"));
        run("extract", join(dir.path, "wand.html"), "-o", join(dir.path, "ziel.ifc"), "--library-name", "Ziel");
        lines = [];

        run("import", join(dir.path, "wand.ifc"), join(dir.path, "ziel.ifc"));

        expect(lines).toEqual(["Imported 0, skipped 1 existing", `Written to ${join(dir.path, "ziel.merged.ifc")}`]);
        expect(existsSync(join(dir.path, "ziel.merged.ifc"))).toBe(true);
    });

    test("should report failures through the exit code", () => {
        run("extract", join(dir.path, "fehlt.html"));

        expect(exitCode).toBe(1);
        expect(lines).toEqual([]);
    });

    test("should stop on an invalid config file", () => {
        const configPath = join(dir.path, "settings.json");
        writeFileSync(configPath, JSON.stringify({ matchStrategy: "fuzzy" }));

        run("--config", configPath, "extract", join(dir.path, "wand.html"));

        expect(exitCode).toBe(1);
        expect(existsSync(join(dir.path, "wand.ifc"))).toBe(false);
    });

    test("should summarise a batch run", () => {
        run("batch", dir.path);

        expect(lines).toEqual([`ok ${join(dir.path, "wand.html")}`, "1 succeeded, 0 failed"]);
        expect(exitCode).toBeUndefined();
    });
});
