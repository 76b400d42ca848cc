/**
 * Button; styles live in index.css (.btn, .btn-sm).
 */

import type { ButtonHTMLAttributes } from "react";

interface ButtonProps extends ButtonHTMLAttributes<HTMLButtonElement> {
  size?: "sm" | "md";
}

export function Button({ size = "md", className = "", type = "button", children, ...props }: ButtonProps) {
  const classes = ["btn", size === "sm" ? "btn-sm" : "", className].filter(Boolean).join(" ");
  return (
    <button type={type} className={classes} {...props}>
      {children}
    </button>
  );
}
