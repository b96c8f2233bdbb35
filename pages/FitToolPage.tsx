import React from 'react';
import { usePreset } from '../contexts/PresetContext';
import { useFitSession } from '../hooks/useFitSession';
import { Slider } from '../components/Slider';
import { FitRadarChart } from '../components/charts/FitRadarChart';
import { FitScoreTable } from '../components/fit/FitScoreTable';
import { BestFitCallout } from '../components/fit/BestFitCallout';

const Card: React.FC<{ title: string; children: React.ReactNode; action?: React.ReactNode }> = ({ title, children, action }) => (
    <section className="bg-fit-bg-light border border-fit-border rounded-lg p-5">
        <div className="flex justify-between items-center mb-4">
            <h2 className="text-base font-bold text-fit-text">{title}</h2>
            {action}
        </div>
        {children}
    </section>
);

export const FitToolPage: React.FC = () => {
    const { preset } = usePreset();
    const { task, evaluation, orientation, setValue, reset } = useFitSession(preset);

    return (
        <div className="p-4 md:p-8 grid grid-cols-1 lg:grid-cols-2 gap-8">
            <Card
                title="Score your task"
                action={<button onClick={reset} className="text-xs font-mono text-fit-text-light hover:text-fit-accent">reset</button>}
            >
                <div className="space-y-5">
                    {preset.dimensions.map((dim, i) => (
                        <Slider
                            key={dim.name}
                            label={dim.name}
                            question={dim.question}
                            lowLabel={dim.low}
                            highLabel={dim.high}
                            value={task[i]}
                            setValue={v => setValue(i, v)}
                            min={preset.scale.min}
                            max={preset.scale.max}
                            step={preset.scale.step}
                        />
                    ))}
                </div>
            </Card>

            <div className="space-y-8">
                <Card title="Profile overlay">
                    <FitRadarChart model={preset} polygons={evaluation.polygons} orientation={orientation} />
                </Card>
                <Card title="Fit scores">
                    <FitScoreTable results={evaluation.results} mode={preset.scoring.mode} />
                    <BestFitCallout best={evaluation.best} mode={preset.scoring.mode} />
                </Card>
            </div>
        </div>
    );
};
