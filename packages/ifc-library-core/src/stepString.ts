// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

const HEX4 = /^[0-9A-F]{4}$/i;
const HEX8 = /^[0-9A-F]{8}$/i;

/**
 * Encodes text as the contents of a STEP string literal (without the
 * surrounding quotes). Characters outside printable ASCII are written as
 * `\X2\`/`\X4\` hex runs.
 */
export function encodeStepString(value: string): string {
    let result = "";
    let run: number[] = [];

    const flush = () => {
        if (run.length === 0) return;
        const wide = run.some((x) => x > 0xffff);
        const width = wide ? 8 : 4;
        const hex = run.map((x) => x.toString(16).toUpperCase().padStart(width, "0")).join("");
        result += `${wide ? "\\X4\\" : "\\X2\\"}${hex}\\X0\\`;
        run = [];
    };

    for (const char of value) {
        const code = char.codePointAt(0) ?? 0;
        if (code < 0x20 || code > 0x7e) {
            run.push(code);
            continue;
        }
        flush();
        if (char === "'") result += "''";
        else if (char === "\\") result += "\\\\";
        else result += char;
    }
    flush();

    return result;
}

export function quote(value: string): string {
    return `'${encodeStepString(value)}'`;
}

/**
 * Decodes the contents of a STEP string literal (without the surrounding quotes).
 */
export function decodeStepString(value: string): string {
    let result = "";
    let i = 0;

    while (i < value.length) {
        const ch = value[i];

        if (ch === "'" && value[i + 1] === "'") {
            result += "'";
            i += 2;
            continue;
        }

        if (ch !== "\\") {
            result += ch;
            i++;
            continue;
        }

        if (value[i + 1] === "\\") {
            result += "\\";
            i += 2;
            continue;
        }

        const directive = value.slice(i, i + 4).toUpperCase();
        if (directive === "\\X2\\" || directive === "\\X4\\") {
            const width = directive === "\\X2\\" ? 4 : 8;
            const pattern = width === 4 ? HEX4 : HEX8;
            const end = value.toUpperCase().indexOf("\\X0\\", i + 4);
            if (end < 0) {
                result += ch;
                i++;
                continue;
            }
            const hex = value.slice(i + 4, end);
            for (let j = 0; j + width <= hex.length; j += width) {
                const chunk = hex.slice(j, j + width);
                if (pattern.test(chunk)) {
                    result += String.fromCodePoint(Number.parseInt(chunk, 16));
                }
            }
            i = end + 4;
            continue;
        }

        if (directive.startsWith("\\X\\") && HEX4.test(`00${value.slice(i + 3, i + 5)}`)) {
            result += String.fromCharCode(Number.parseInt(value.slice(i + 3, i + 5), 16));
            i += 5;
            continue;
        }

        result += ch;
        i++;
    }

    return result;
}
