import { defineConfig } from "./src/config";

export default defineConfig({
  source: "site",
  target: "build",
  cleanUrls: true,
  data: {
    siteTitle: "Pagewright example",
    author: "Example Author",
  },
  ignore: ["*.bak"],
  live: {
    port: 8080,
  },
});
