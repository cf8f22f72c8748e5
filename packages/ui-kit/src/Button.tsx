import React from "react";

export type ButtonVariant = "primary" | "ghost" | "danger";

type ButtonProps = React.ButtonHTMLAttributes<HTMLButtonElement> & {
  variant?: ButtonVariant;
  /** Renders as a toggle and sets `aria-pressed`. */
  pressed?: boolean;
};

export function Button({
  variant = "primary",
  pressed,
  className,
  type = "button",
  children,
  ...props
}: ButtonProps) {
  const classes = ["button", `button-${variant}`, pressed ? "button-pressed" : "", className ?? ""]
    .filter(Boolean)
    .join(" ");
  return (
    <button type={type} className={classes} aria-pressed={pressed} {...props}>
      {children}
    </button>
  );
}
