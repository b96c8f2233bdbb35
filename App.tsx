import React from 'react';
import { HashRouter, Routes, Route } from 'react-router-dom';
import { Header } from './components/Header';
import { ErrorBoundary } from './components/ErrorBoundary';
import { PresetProvider } from './contexts/PresetContext';
import { FitToolPage } from './pages/FitToolPage';
import { ProfilesPage } from './pages/ProfilesPage';

function App() {
  return (
    <ErrorBoundary>
      <HashRouter>
        <PresetProvider>
          <div className="min-h-screen flex flex-col">
            <Header />
            <main className="flex-grow">
              <Routes>
                <Route path="/" element={<FitToolPage />} />
                <Route path="/profiles" element={<ProfilesPage />} />
              </Routes>
            </main>
          </div>
        </PresetProvider>
      </HashRouter>
    </ErrorBoundary>
  );
}

export default App;
