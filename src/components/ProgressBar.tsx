export default function ProgressBar({ value, max, passAt }: { value: number; max: number; passAt?: number }) {
  const pct = Math.max(0, Math.min(100, Math.round((value / Math.max(1, max)) * 100)));
  return (
    <div
      className="relative w-full h-3 bg-neutral-200 rounded-full overflow-hidden"
      role="progressbar"
      aria-valuemin={0}
      aria-valuemax={max}
      aria-valuenow={value}
    >
      <div className="h-full bg-blue-500" style={{ width: `${pct}%` }} />
      {passAt !== undefined && <div className="absolute top-0 h-full w-px bg-neutral-800" style={{ left: `${passAt}%` }} />}
    </div>
  );
}
