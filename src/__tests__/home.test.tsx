import React from "react";
import { afterEach, describe, expect, it, vi } from "vitest";
import { render, screen, within } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import Home from "@/app/page";
import { deferred, jsonResponse, makeFile, sampleResult } from "./fixtures/analysis";
import type { AnalyzeFetch, AnalyzeResponseLike } from "@/lib/analyze-client";

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

function stubFetch(impl: AnalyzeFetch) {
  const fetchMock = vi.fn<AnalyzeFetch>(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

async function selectBoth(user: ReturnType<typeof userEvent.setup>) {
  await user.upload(screen.getByLabelText("Select rubric file"), makeFile("rubric.txt", 10 * 1024, "text/plain"));
  await user.upload(
    screen.getByLabelText("Select assignment file"),
    makeFile("assignment.pdf", 200 * 1024, "application/pdf")
  );
}

describe("Home Page", () => {
  it("renders the upload and results sections", () => {
    render(<Home />);
    expect(screen.getByRole("heading", { name: /upload documents/i })).toBeInTheDocument();
    expect(screen.getByRole("heading", { name: /analysis results/i })).toBeInTheDocument();
    expect(screen.getByRole("button", { name: "Analyze" })).toBeDisabled();
  });

  it("uploads both documents and renders the scored feedback", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const fetchMock = stubFetch(async () => jsonResponse(200, sampleResult));
    const user = userEvent.setup();
    render(<Home />);

    await selectBoth(user);
    const analyze = screen.getByRole("button", { name: "Analyze" });
    expect(analyze).toBeEnabled();
    await user.click(analyze);

    expect(await screen.findByText("Score: 87%")).toBeInTheDocument();
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("/analyze");
    expect(init.method).toBe("POST");
    expect(Array.from(init.body.keys())).toEqual(["rubric", "assignment"]);

    const items = within(screen.getByRole("list", { name: "Requirement feedback" })).getAllByRole("listitem");
    expect(items).toHaveLength(1);
    expect(items[0]).toHaveAttribute("data-status", "positive");
    expect(within(screen.getByRole("list", { name: "Strengths" })).getAllByRole("listitem")).toHaveLength(1);
    expect(within(screen.getByRole("list", { name: "Areas for improvement" })).getAllByRole("listitem")).toHaveLength(1);
    expect(screen.getByTestId("summary")).toHaveTextContent("Solid work.");
    expect(screen.queryByRole("alert")).not.toBeInTheDocument();
  });

  it("blocks an oversized rubric before any request", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const fetchMock = stubFetch(async () => jsonResponse(200, sampleResult));
    const user = userEvent.setup();
    render(<Home />);

    await user.upload(screen.getByLabelText("Select rubric file"), makeFile("rubric.pdf", 6 * 1024 * 1024, "application/pdf"));

    expect(screen.getByRole("alert")).toHaveTextContent("rubric file is too large. Please keep files under 5MB.");
    expect(screen.getByRole("button", { name: "Analyze" })).toBeDisabled();
    expect(screen.queryByTestId("rubric-selected")).not.toBeInTheDocument();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("shows the endpoint's error and lets the user retry", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    stubFetch(async () => jsonResponse(400, { error: "Bad rubric format" }));
    const user = userEvent.setup();
    render(<Home />);

    await selectBoth(user);
    await user.click(screen.getByRole("button", { name: "Analyze" }));

    expect(await screen.findByRole("alert")).toHaveTextContent("Bad rubric format");
    expect(screen.getByRole("button", { name: "Analyze" })).toBeEnabled();
    expect(screen.queryByText(/^Score:/)).not.toBeInTheDocument();
  });

  it("disables the submit control while the request is pending", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const pending = deferred<AnalyzeResponseLike>();
    stubFetch(() => pending.promise);
    const user = userEvent.setup();
    render(<Home />);

    await selectBoth(user);
    await user.click(screen.getByRole("button", { name: "Analyze" }));

    expect(screen.getByRole("button", { name: "Analyzing..." })).toBeDisabled();

    pending.resolve(jsonResponse(200, sampleResult));
    expect(await screen.findByText("Score: 87%")).toBeInTheDocument();
    expect(screen.getByRole("button", { name: "Analyze" })).toBeEnabled();
  });
});
