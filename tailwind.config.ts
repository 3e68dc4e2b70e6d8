import type { Config } from 'tailwindcss';

const config: Config = {
  content: ['./app/**/*.{ts,tsx}', './components/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        noshow: '#FF9500',
        show: '#007AFF',
        paper: '#1E1E1E',
        plot: '#2c3e50',
      },
    },
  },
  plugins: [],
};

export default config;
