import { describe, expect, it, vi } from "vitest";
import { render, screen } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import { MainMenu } from "./MainMenu";

describe("MainMenu", () => {
  const setup = () => {
    const onPlay = vi.fn();
    render(<MainMenu onPlay={onPlay} />);
    const button = screen.getByRole("button", { name: /play/i });
    return { onPlay, button };
  };

  it("shows the title and the rules", () => {
    setup();
    expect(
      screen.getByRole("heading", { level: 1, name: "Sum Grid" })
    ).toBeInTheDocument();
    expect(
      screen.getByText("Place each digit from 1 to 9 exactly once")
    ).toBeInTheDocument();
  });

  it("starts a game when Play is clicked", async () => {
    const user = userEvent.setup();
    const { button, onPlay } = setup();

    await user.click(button);
    expect(onPlay).toHaveBeenCalledTimes(1);
  });
});
