import { render, screen } from "@testing-library/react";
import { describe, expect, it } from "vitest";

import StatusBanner from "~/components/status-banner";

describe("StatusBanner", () => {
  it("renders a warning as status", () => {
    render(<StatusBanner message="No clients were found" variant="warning" />);
    const banner = screen.getByRole("status");
    expect(banner).toHaveTextContent("No clients were found");
    expect(banner).toHaveClass("status-banner--warning");
  });

  it("announces errors as alerts", () => {
    render(<StatusBanner message="Error generating QBR: Template file not found: custom.pptx" variant="error" />);
    expect(screen.getByRole("alert")).toHaveClass("status-banner", "status-banner--error");
  });
});
