import { render, screen } from "@testing-library/react";
import { MemoryRouter } from "react-router-dom";

vi.mock("../api", () => ({
  api: {
    history: vi.fn().mockRejectedValue(new Error("offline")),
  },
}));

import { App } from "../App";

describe("App with an unreachable data source", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("shows a single error and nothing downstream", async () => {
    render(
      <MemoryRouter initialEntries={["/market"]}>
        <App />
      </MemoryRouter>,
    );

    const alert = await screen.findByRole("alert");
    expect(alert).toHaveTextContent("Market data unavailable");
    expect(alert).toHaveTextContent("Market data could not be downloaded: offline");
    expect(screen.queryByText("USD / MXN")).not.toBeInTheDocument();
    expect(screen.queryByText("Historical Price Analysis")).not.toBeInTheDocument();
  });
});
