// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

export const STRAW_WALL_REPORT = `<!DOCTYPE html>
<html>
<body>
<ul class="category">
    <li class="section">
        <h1>331 Tragende Außenwände<span>Außenwände</span></h1>
        <ul class="report-elements">
            <li class="section">
                <h2><a class="page" href="/elements/42/">Strohballen - Holz</a></h2>
                <dl class="clearfix">
                    <dt>Menge:</dt>
                    <dd>200,00 m²</dd>
                    <dt>Nutzungsdauer</dt>
                    <dd>50 Jahre</dd>
                </dl>
                <div class="element-assets">
                    <h3>Baustoffe</h3>
                    <table>
                        <tbody>
                            <tr class="component">
                                <td class="firstColumn">1</td>
                                <td class="lastColumn">
                                    <span class="process-config-name">Lehmputz</span>
                                    <span class="info-is-extant">Neu</span>
                                    <span class="info-quantity"><span>15,00 mm</span></span>
                                    <span class="info-life-time">40 Jahre</span>
                                </td>
                            </tr>
                            <tr class="details">
                                <td colspan="2">
                                    <table class="report-assets-details">
                                        <tbody>
                                            <tr class="table-headlines">
                                                <td>Phase</td><td>Anteil</td><td>Prozess</td><td>Bezug</td><td>UUID</td>
                                            </tr>
                                            <tr>
                                                <td>Herstellung</td><td>100%</td><td>Lehmputz</td><td>1 kg</td><td>p-001</td>
                                            </tr>
                                            <tr>
                                                <td>Entsorgung</td><td>100%</td><td>Bauschutt</td><td>1 kg</td><td>p-002</td>
                                            </tr>
                                            <tr>
                                                <td>Kurz</td><td>zu</td><td>wenig</td>
                                            </tr>
                                        </tbody>
                                    </table>
                                </td>
                            </tr>
                            <tr class="component">
                                <td class="firstColumn">2</td>
                                <td class="lastColumn">
                                    <span class="process-config-name">Stroh</span>
                                    <span class="info-quantity"><span>360,00 mm</span></span>
                                </td>
                            </tr>
                        </tbody>
                    </table>
                </div>
            </li>
        </ul>
    </li>
</ul>
</body>
</html>
`;

export const STRAW_WALL_PROJECT = `<?xml version="1.0" encoding="UTF-8"?>
<elca xmlns="https://www.bauteileditor.de">
    <project>
        <element uuid="e1" din276Code="331" quantity="200" refUnit="m2">
            <elementInfo>
                <name>Strohballen - Holz</name>
                <description>Außenwand mit Strohdämmung</description>
            </elementInfo>
            <components>
                <component uuid="c1" isLayer="true" processConfigUuid="pc-1" processConfigName="Stroh" layerSize="180" lifeTime="50" calcLca="true" isExtant="false" layerPosition="2" layerAreaRatio="1"/>
                <component uuid="c2" isLayer="true" processConfigName="Lehmputz" layerSize="N/A"/>
            </components>
        </element>
        <element din276Code="999">
            <components>
                <component uuid="c9" processConfigName="Ohne Element" layerSize="5"/>
            </components>
        </element>
    </project>
</elca>
`;
