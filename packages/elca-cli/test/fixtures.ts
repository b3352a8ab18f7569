// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

export const REPORT_HTML = `<ul class="category"><li class="section">
    <h1>331 Tragende Außenwände<span>Außenwände</span></h1>
    <ul class="report-elements"><li class="section">
        <h2><a class="page" href="/elements/42/">Strohballen - Holz</a></h2>
        <dl class="clearfix"><dt>Menge:</dt><dd>200,00 m²</dd></dl>
        <div class="element-assets"><h3>Baustoffe</h3><table><tbody>
            <tr class="component"><td class="firstColumn">1</td><td class="lastColumn">
                <span class="process-config-name">Lehmputz</span>
                <span class="info-quantity"><span>15,00 mm</span></span>
            </td></tr>
            <tr class="component"><td class="firstColumn">2</td><td class="lastColumn">
                <span class="process-config-name">Stroh</span>
                <span class="info-quantity"><span>360,00 mm</span></span>
            </td></tr>
        </tbody></table></div>
    </li></ul>
</li></ul>`;

export const PROJECT_XML = `<?xml version="1.0" encoding="UTF-8"?>
<elca xmlns="https://www.bauteileditor.de">
    <element uuid="e1">
        <elementInfo><name>Strohballen - Holz</name></elementInfo>
        <component uuid="c1" processConfigName="Stroh" layerSize="180"/>
    </element>
</elca>`;

export function temporaryDirectory(): { path: string; dispose: () => void } {
    const path = mkdtempSync(join(tmpdir(), "elca-cli-"));
    return { path, dispose: () => rmSync(path, { recursive: true, force: true }) };
}
