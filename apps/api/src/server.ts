import { createApp } from './app.js';
import { config } from './config.js';
import { getDataset } from './services/dataset.js';

const dataset = await getDataset();
if (dataset.error) {
  console.log('Serving an empty dataset; every page will report that no data is available');
} else {
  console.log(`Loaded ${dataset.listings.length} listings from ${config.datasetPath}`);
}

createApp(getDataset).listen(config.port, () => {
  console.log(`API server listening on http://localhost:${config.port}`);
});
