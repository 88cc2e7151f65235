import React from "react";
import { describe, it, expect, vi } from "vitest";
import { render, screen } from "@testing-library/react";
import userEvent from "@testing-library/user-event";

import UploadPanel from "@/components/UploadPanel";
import { makeFile } from "./fixtures/analysis";

const noFiles = { rubric: null, assignment: null };

function renderPanel(overrides: Partial<React.ComponentProps<typeof UploadPanel>> = {}) {
  const props: React.ComponentProps<typeof UploadPanel> = {
    files: noFiles,
    canSubmit: false,
    submitting: false,
    onSelect: vi.fn(),
    onClear: vi.fn(),
    onSubmit: vi.fn(),
    ...overrides,
  };
  render(<UploadPanel {...props} />);
  return props;
}

describe("UploadPanel", () => {
  it("offers one picker per slot with the accepted formats hint", () => {
    renderPanel();
    expect(screen.getByRole("heading", { name: /upload documents/i })).toBeInTheDocument();
    expect(screen.getByLabelText("Select rubric file")).toHaveAttribute("accept", ".pdf,.doc,.docx,.txt");
    expect(screen.getByLabelText("Select assignment file")).toHaveAttribute("accept", ".pdf,.doc,.docx,.txt");
    expect(screen.getByText("Accepted formats: .pdf, .doc, .docx, .txt (max 5MB each).")).toBeInTheDocument();
  });

  it("disables Analyze when it cannot submit", () => {
    renderPanel();
    expect(screen.getByRole("button", { name: "Analyze" })).toBeDisabled();
  });

  it("reports picked files with their slot", async () => {
    const user = userEvent.setup();
    const props = renderPanel();
    const rubric = makeFile("rubric.txt", 10 * 1024, "text/plain");
    await user.upload(screen.getByLabelText("Select rubric file"), rubric);
    expect(props.onSelect).toHaveBeenCalledWith("rubric", rubric);
  });

  it("shows selected names and sizes", () => {
    renderPanel({
      files: {
        rubric: makeFile("rubric.txt", 10 * 1024, "text/plain"),
        assignment: makeFile("assignment.pdf", 200 * 1024, "application/pdf"),
      },
      canSubmit: true,
    });
    expect(screen.getByTestId("rubric-selected")).toHaveTextContent("rubric.txt (10.0 KB)");
    expect(screen.getByTestId("assignment-selected")).toHaveTextContent("assignment.pdf (200.0 KB)");
  });

  it("calls onSubmit when enabled", async () => {
    const user = userEvent.setup();
    const props = renderPanel({ canSubmit: true });
    await user.click(screen.getByRole("button", { name: "Analyze" }));
    expect(props.onSubmit).toHaveBeenCalledTimes(1);
  });

  it("shows progress on the button while submitting", () => {
    renderPanel({ submitting: true });
    expect(screen.getByRole("button", { name: "Analyzing..." })).toBeDisabled();
  });
});
