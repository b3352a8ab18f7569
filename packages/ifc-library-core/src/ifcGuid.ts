// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { randomUUID } from "node:crypto";

const CHARS = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz_$";
const GUID_REGEX = /^[0-3][0-9A-Za-z_$]{21}$/;
const HEX_REGEX = /^[0-9a-f]{32}$/i;

/**
 * IFC GlobalIds: a 128-bit UUID compressed into 22 characters of the IFC
 * base-64 alphabet (one leading 2-character group, then five 4-character groups).
 */
export class IfcGuid {
    static create(): string {
        return IfcGuid.compress(randomUUID());
    }

    static compress(uuid: string): string {
        const hex = uuid.replaceAll("-", "");
        if (!HEX_REGEX.test(hex)) {
            throw new Error(`Not a 128-bit hex identifier: ${uuid}`);
        }

        const bytes: number[] = [];
        for (let i = 0; i < 32; i += 2) {
            bytes.push(Number.parseInt(hex.slice(i, i + 2), 16));
        }

        let result = toBase64(bytes[0], 2);
        for (let i = 1; i < 16; i += 3) {
            result += toBase64((bytes[i] << 16) + (bytes[i + 1] << 8) + bytes[i + 2], 4);
        }
        return result;
    }

    static expand(guid: string): string {
        if (!IfcGuid.isValid(guid)) {
            throw new Error(`Not an IFC GlobalId: ${guid}`);
        }

        const bytes = [fromBase64(guid.slice(0, 2))];
        for (let i = 2; i < 22; i += 4) {
            const value = fromBase64(guid.slice(i, i + 4));
            bytes.push((value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff);
        }

        const hex = bytes.map((x) => x.toString(16).padStart(2, "0")).join("");
        return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join("-");
    }

    static isValid(guid: string): boolean {
        return GUID_REGEX.test(guid);
    }
}

/**
 * Hands out GlobalIds for one generation run and never repeats one.
 */
export class IfcGuidRegistry {
    private readonly _issued = new Set<string>();

    constructor(private readonly factory: () => string = IfcGuid.create) {}

    next(): string {
        let guid = this.factory();
        while (this._issued.has(guid)) {
            guid = this.factory();
        }
        this._issued.add(guid);
        return guid;
    }

    get size() {
        return this._issued.size;
    }
}

function toBase64(value: number, length: number): string {
    let result = "";
    for (let i = 0; i < length; i++) {
        result = CHARS[value % 64] + result;
        value = Math.floor(value / 64);
    }
    return result;
}

function fromBase64(text: string): number {
    let value = 0;
    for (const ch of text) {
        value = value * 64 + CHARS.indexOf(ch);
    }
    return value;
}
