// Script entry: `npm run build` bundles it to dist/edge-media-fallback.js for the page
import { install } from './index';

install(window);
