import { useState } from "react";

type RecommendationMode = "ai" | "manual";

interface RecommendationFieldsProps {
  aiAvailable: boolean;
  defaultCount?: number;
}

const MIN_COUNT = 1;
const MAX_COUNT = 10;

function clampCount(value: number) {
  if (!Number.isFinite(value)) return MIN_COUNT;
  return Math.min(MAX_COUNT, Math.max(MIN_COUNT, Math.floor(value)));
}

export function RecommendationFields({ aiAvailable, defaultCount = 3 }: RecommendationFieldsProps) {
  const [mode, setMode] = useState<RecommendationMode>(aiAvailable ? "ai" : "manual");
  const [count, setCount] = useState(() => clampCount(defaultCount));

  return (
    <section className="form-panel">
      <h2>Recommendations</h2>
      <div className="mode-toggle" role="radiogroup" aria-label="Recommendation source">
        <label>
          <input
            type="radio"
            name="mode"
            value="ai"
            checked={mode === "ai"}
            disabled={!aiAvailable}
            onChange={() => setMode("ai")}
          />
          Generate with AI
        </label>
        <label>
          <input
            type="radio"
            name="mode"
            value="manual"
            checked={mode === "manual"}
            onChange={() => setMode("manual")}
          />
          Enter manually
        </label>
      </div>
      {!aiAvailable ? <p className="meta">AI recommendations need OPENAI_API_KEY on the server.</p> : null}

      <div className="field-row">
        <label>
          Number of recommendations
          <input
            type="number"
            name="count"
            min={MIN_COUNT}
            max={MAX_COUNT}
            value={count}
            onChange={(event) => setCount(clampCount(Number(event.target.value)))}
          />
        </label>
        {mode === "ai" ? (
          <label>
            Ticket sample size
            <input type="number" name="sampleSize" min={10} max={500} step={10} defaultValue={100} />
          </label>
        ) : null}
      </div>

      {mode === "manual"
        ? Array.from({ length: count }).map((_, index) => (
            <label key={index}>
              Recommendation {index + 1}
              <input type="text" name="recommendation" />
            </label>
          ))
        : null}
    </section>
  );
}

export default RecommendationFields;
