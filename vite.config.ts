import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import tailwindcss from "@tailwindcss/vite";

// https://vite.dev/config/
export default defineConfig({
  plugins: [react(), tailwindcss()],
  define: {
    __APP_TITLE__: JSON.stringify(process.env.VITE_APP_TITLE || "Sum Grid"),
  },
});
