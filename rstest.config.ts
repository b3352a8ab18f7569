// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { defineConfig } from "@rstest/core";

export default defineConfig({
    include: ["packages/*/test/**/*.test.ts"],
    testEnvironment: "node",
});
