import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import App from './App';
import { createPaperSource } from './api';
import { config } from './config';
import { ExpansionEngine } from './graph/expansionEngine';
import './index.css';

const engine = new ExpansionEngine({
  source: createPaperSource(config),
  maxReferences: config.maxReferences,
});

const container = document.getElementById('root');
if (!container) throw new Error('Missing #root element');

createRoot(container).render(
  <StrictMode>
    <App engine={engine} initialMaxReferences={config.maxReferences ?? 0} />
  </StrictMode>
);
