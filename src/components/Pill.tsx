import React from "react";

export type PillTone = "neutral" | "good" | "bad" | "info";

const TONES: Record<PillTone, string> = {
  neutral: "bg-neutral-100 border-neutral-200",
  good: "bg-green-100 border-green-300 text-green-800",
  bad: "bg-red-100 border-red-300 text-red-800",
  info: "bg-blue-100 border-blue-300 text-blue-800",
};

export default function Pill({ children, tone = "neutral" }: { children: React.ReactNode; tone?: PillTone }) {
  return <span className={`px-2 py-1 rounded-full text-xs border ${TONES[tone]}`}>{children}</span>;
}
