// vite.config.ts
import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import { VitePWA } from "vite-plugin-pwa";

export default defineConfig({
  plugins: [
    react(),
    VitePWA({
      registerType: "autoUpdate",
      manifest: {
        name: "Car EMI Planner",
        short_name: "Car EMI",
        description: "Car loan EMI and amortization calculator with prepayments",
        theme_color: "#020617",
        background_color: "#020617",
        display: "standalone",
        icons: [],
      },
    }),
  ],
});
