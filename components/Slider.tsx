import React from 'react';

interface SliderProps {
    label: string;
    question: string;
    lowLabel: string;
    highLabel: string;
    value: number;
    setValue: (v: number) => void;
    min: number;
    max: number;
    step?: number;
}

/** One dimension: the question above, anchor labels on both sides of the range input. */
export const Slider: React.FC<SliderProps> = (props) => (
    <div className="space-y-1">
       <p className="slider-question text-sm text-fit-text">{props.question}</p>
       <div className="grid grid-cols-[1fr_3fr_1fr] items-center gap-3">
           <span className="slider-edge slider-edge--left text-xs text-fit-text-light text-right">{props.lowLabel}</span>
           <input
               type="range"
               aria-label={props.label}
               min={props.min} max={props.max} step={props.step ?? 1}
               value={props.value}
               onChange={e => props.setValue(Number(e.target.value))}
               className="w-full h-2 bg-fit-border rounded-lg appearance-none cursor-pointer"
           />
           <span className="slider-edge slider-edge--right text-xs text-fit-text-light">{props.highLabel}</span>
       </div>
       <div className="text-[10px] font-mono text-fit-text-light text-center">{props.label}: {props.value}</div>
    </div>
);
