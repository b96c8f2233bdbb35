import React, { createContext, useContext, ReactNode } from 'react';
import { useSearchParams } from 'react-router-dom';
import type { FitModel } from '../types';
import { DEFAULT_PRESET_ID, getPreset, PRESETS } from '../data/presets';

interface PresetContextType {
  preset: FitModel;
  presets: readonly FitModel[];
  setPreset: (id: string) => void;
}

const PresetContext = createContext<PresetContextType | undefined>(undefined);

export const PresetProvider: React.FC<{ children: ReactNode }> = ({ children }) => {
  const [searchParams, setSearchParams] = useSearchParams();

  const preset = getPreset(searchParams.get('preset'));

  const setPreset = (id: string) => {
    setSearchParams(prev => {
        const next = new URLSearchParams(prev);
        if (id === DEFAULT_PRESET_ID) next.delete('preset');
        else next.set('preset', id);
        return next;
    }, { replace: true });
  };

  return (
    <PresetContext.Provider value={{ preset, presets: PRESETS, setPreset }}>
      {children}
    </PresetContext.Provider>
  );
};

export const usePreset = (): PresetContextType => {
  const context = useContext(PresetContext);
  if (!context) {
    throw new Error('usePreset must be used within a PresetProvider');
  }
  return context;
};
