import React from "react";
import { clsx } from "clsx";
import { formatTime } from "../utils/cellNotation";

interface StatCardProps {
  label: string;
  value: number;
}

const StatCard: React.FC<StatCardProps> = ({ label, value }) => (
  <div className="w-24 rounded-xl bg-white/10 p-1.5 text-center">
    <p className="text-[11px] text-white/60">{label}</p>
    <p className="text-lg font-bold text-white">{value}</p>
  </div>
);

interface GameHeaderProps {
  score: number;
  level: number;
  timeLeft: number;
  isTimeLow: boolean;
}

export const GameHeader: React.FC<GameHeaderProps> = React.memo(
  ({ score, level, timeLeft, isTimeLow }) => {
    return (
      <div className="flex w-full items-center justify-between">
        <StatCard label="Score" value={score} />
        <div
          role="timer"
          aria-label="Time left"
          className={clsx(
            "flex h-20 w-20 items-center justify-center rounded-full border-4 text-lg font-extrabold text-white",
            isTimeLow ? "border-red-500" : "border-cyan-400"
          )}
        >
          {formatTime(timeLeft)}
        </div>
        <StatCard label="Level" value={level} />
      </div>
    );
  }
);
