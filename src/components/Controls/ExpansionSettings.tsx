interface ExpansionSettingsProps {
  /** 0 means no cap. */
  maxReferences: number;
  onMaxReferencesChange: (max: number) => void;
}

export const MAX_REFERENCES_SLIDER = 100;

export function ExpansionSettings({ maxReferences, onMaxReferencesChange }: ExpansionSettingsProps) {
  return (
    <div className="flex items-center gap-3">
      <label htmlFor="max-references" className="text-gray-400 text-sm font-medium">
        References per expansion
      </label>
      <input
        id="max-references"
        type="range"
        min={0}
        max={MAX_REFERENCES_SLIDER}
        step={5}
        value={maxReferences}
        onChange={(e) => onMaxReferencesChange(parseInt(e.target.value, 10))}
        className="
          w-28 h-1.5 bg-white/10 rounded-full appearance-none cursor-pointer
          [&::-webkit-slider-thumb]:appearance-none
          [&::-webkit-slider-thumb]:w-3
          [&::-webkit-slider-thumb]:h-3
          [&::-webkit-slider-thumb]:bg-purple-500
          [&::-webkit-slider-thumb]:rounded-full
          [&::-webkit-slider-thumb]:cursor-pointer
          [&::-webkit-slider-thumb]:shadow-[0_0_10px_rgba(168,85,247,0.5)]
        "
      />
      <span className="text-purple-400 text-sm font-mono w-14">
        {maxReferences === 0 ? 'all' : maxReferences}
      </span>
      <span className="text-gray-600 text-xs">applies to the next search</span>
    </div>
  );
}
