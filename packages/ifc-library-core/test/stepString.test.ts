// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { describe, expect, test } from "@rstest/core";
import { decodeStepString, encodeStepString, quote } from "../src/stepString";

describe("stepString", () => {
    test("should escape apostrophes and backslashes", () => {
        expect(encodeStepString("Wall 'A'")).toBe("Wall ''A''");
        expect(encodeStepString("C:\\lib")).toBe("C:\\\\lib");
        expect(quote("Stroh")).toBe("'Stroh'");
    });

    test("should write non-ASCII characters as hex runs", () => {
        expect(encodeStepString("Außenwände")).toBe("Au\\X2\\00DF\\X0\\enw\\X2\\00E4\\X0\\nde");
        expect(encodeStepString("m²")).toBe("m\\X2\\00B2\\X0\\");
        expect(encodeStepString("Öl")).toBe("\\X2\\00D6\\X0\\l");
        expect(encodeStepString("ÄÖ")).toBe("\\X2\\00C400D6\\X0\\");
    });

    test("should decode what it encodes", () => {
        for (const text of ["Tragende Außenwände", "Wall 'A'", "C:\\lib", "200,00 m²"]) {
            expect(decodeStepString(encodeStepString(text))).toBe(text);
        }
    });

    test("should decode 8-bit escapes", () => {
        expect(decodeStepString("Stra\\X\\DFe")).toBe("Straße");
        expect(decodeStepString("\\X4\\0001F600\\X0\\")).toBe("😀");
    });

    test("should keep an unterminated hex run as text", () => {
        expect(decodeStepString("a\\X2\\00E4")).toBe("a\\X2\\00E4");
    });
});
