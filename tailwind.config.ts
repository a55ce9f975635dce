import type { Config } from "tailwindcss";

const config: Config = {
  content: ["./app/**/*.{ts,tsx}", "./lib/**/*.ts"],
  theme: {
    extend: {
      colors: {
        surface: "#0f0f0f",
        surface2: "#1a1a1a",
        surface3: "#252525",
        border: "#2a2a2a",
        muted: "#737373",
        // field green
        accent: "#65a30d",
        accentDim: "#4d7c0f",
      },
    },
  },
  plugins: [],
};
export default config;
