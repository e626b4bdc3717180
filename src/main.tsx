import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import DayLengthApp from './components/DayLengthApp';

const container = document.getElementById('root');
if (!container) throw new Error('Missing #root element');

createRoot(container).render(
  <StrictMode>
    <DayLengthApp />
  </StrictMode>,
);
