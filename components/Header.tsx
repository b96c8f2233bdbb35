import React from 'react';
import { Link, useLocation } from 'react-router-dom';
import { usePreset } from '../contexts/PresetContext';

const NavItem: React.FC<{ to: string; label: string; active: boolean }> = ({ to, label, active }) => (
    <Link
        to={to}
        className={`px-3 py-1 text-sm transition-colors ${active ? 'text-fit-text font-bold' : 'text-fit-text-light hover:text-fit-text'}`}
    >
        {label}
    </Link>
);

export const Header: React.FC = () => {
  const { preset, presets, setPreset } = usePreset();
  const location = useLocation();
  const isActive = (path: string) => location.pathname === path;

  // Links keep the current search string so the chosen preset survives navigation.
  return (
    <header className="border-b p-4 flex justify-between items-center sticky top-0 z-50 backdrop-blur-md bg-fit-bg/90 border-fit-border">
      <div className="flex items-center gap-8">
        <Link to={{ pathname: '/', search: location.search }} className="text-lg font-bold text-fit-accent font-mono hover:opacity-80 transition-opacity">
          TASK FIT
        </Link>
        <nav className="flex items-center gap-2">
            <NavItem to={`/${location.search}`} label="Score a task" active={isActive('/')} />
            <NavItem to={`/profiles${location.search}`} label="Reference profiles" active={isActive('/profiles')} />
        </nav>
      </div>

      <select
        value={preset.id}
        onChange={(e) => setPreset(e.target.value)}
        className="bg-transparent text-fit-text-light text-xs font-mono focus:outline-none hover:text-fit-text cursor-pointer text-right"
        title={preset.description}
      >
        {presets.map(p => (
          <option key={p.id} value={p.id}>{p.label}</option>
        ))}
      </select>
    </header>
  );
};
