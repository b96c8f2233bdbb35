import React from 'react';
import { usePreset } from '../contexts/PresetContext';
import { seriesStyleFor } from '../lib/fit/palette';

export const ProfilesPage: React.FC = () => {
    const { preset } = usePreset();
    const profiles = Array.from(preset.profiles.values());

    return (
        <div className="p-4 md:p-8 space-y-4">
            <div>
                <h1 className="text-xl font-bold text-fit-text">{preset.label}</h1>
                <p className="text-sm text-fit-text-light">{preset.description}</p>
                <p className="text-xs font-mono text-fit-text-light mt-1">
                    scale {preset.scale.min}–{preset.scale.max} · {preset.scoring.mode}
                </p>
            </div>

            <table className="w-full text-sm">
                <thead>
                    <tr className="text-left text-fit-text-light text-xs uppercase">
                        <th className="py-1">Dimension</th>
                        {profiles.map(p => (
                            <th key={p.name} className="py-1 text-right" style={{ color: seriesStyleFor(p.name).color }}>{p.name}</th>
                        ))}
                    </tr>
                </thead>
                <tbody>
                    {preset.dimensions.map((dim, i) => (
                        <tr key={dim.name} className="border-t border-fit-border">
                            <td className="py-1">
                                <div className="text-fit-text">{dim.name}</div>
                                <div className="text-[11px] text-fit-text-light">{dim.question} ({dim.low} → {dim.high})</div>
                            </td>
                            {profiles.map(p => (
                                <td key={p.name} className="py-1 text-right font-mono">{p.values[i]}</td>
                            ))}
                        </tr>
                    ))}
                </tbody>
            </table>
        </div>
    );
};
