import React from "react";

const RULES = [
  "Place each digit from 1 to 9 exactly once",
  "Every row must add up to the total on its right",
  "Every column must add up to the total below it",
];

const TIPS = [
  "A digit typed twice flashes red, then the newer one is cleared",
  "Hints reveal one empty cell, at no cost",
  "Beat the clock to earn 50 points and move up a level",
];

export const Instructions: React.FC = React.memo(() => {
  return (
    <div className="space-y-4 text-sm text-gray-700">
      <div className="space-y-2">
        <h4 className="font-semibold text-gray-900">Basic Rules</h4>
        <ul className="space-y-1 text-xs">
          {RULES.map((rule) => (
            <li key={rule} className="flex items-start">
              <span className="mr-2 mt-0.5 text-blue-600">•</span>
              <span>{rule}</span>
            </li>
          ))}
        </ul>
      </div>

      <div className="space-y-2">
        <h4 className="font-semibold text-gray-900">Good to Know</h4>
        <ul className="space-y-1 text-xs">
          {TIPS.map((tip) => (
            <li key={tip} className="flex items-start">
              <span className="mr-2 mt-0.5 text-green-600">•</span>
              <span>{tip}</span>
            </li>
          ))}
        </ul>
      </div>

      <div className="space-y-2">
        <h4 className="font-semibold text-gray-900">Grid Layout</h4>
        <div className="grid grid-cols-3 gap-1 rounded bg-gray-100 p-2 font-mono text-xs">
          {["A1", "B1", "C1", "A2", "B2", "C2", "A3", "B3", "C3"].map((l) => (
            <div key={l} className="bg-white p-1 text-center">
              {l}
            </div>
          ))}
        </div>
      </div>
    </div>
  );
});
