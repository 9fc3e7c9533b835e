import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it } from "vitest";

import RecommendationFields from "~/components/recommendation-fields";

describe("RecommendationFields", () => {
  it("starts in AI mode when a key is configured", () => {
    render(<RecommendationFields aiAvailable />);
    expect(screen.getByLabelText(/generate with ai/i)).toBeChecked();
    expect(screen.getByLabelText(/ticket sample size/i)).toHaveValue(100);
    expect(screen.queryByLabelText(/recommendation 1/i)).not.toBeInTheDocument();
  });

  it("falls back to manual entry without AI", () => {
    render(<RecommendationFields aiAvailable={false} />);
    expect(screen.getByLabelText(/generate with ai/i)).toBeDisabled();
    expect(screen.getByLabelText(/enter manually/i)).toBeChecked();
    expect(screen.getAllByRole("textbox")).toHaveLength(3);
  });

  it("shows one manual input per requested recommendation", () => {
    render(<RecommendationFields aiAvailable />);
    fireEvent.click(screen.getByLabelText(/enter manually/i));
    fireEvent.change(screen.getByLabelText(/number of recommendations/i), { target: { value: "5" } });

    expect(screen.getAllByRole("textbox")).toHaveLength(5);
    expect(screen.queryByLabelText(/ticket sample size/i)).not.toBeInTheDocument();
  });
});
