// src/components/controls.tsx
//
// Small building blocks shared by the calculator sections: a card
// wrapper with a title and a labelled numeric input.

import type { CSSProperties, ReactNode } from "react";

export function SectionCard({
  title,
  subtitle,
  children,
}: {
  title: string;
  subtitle?: string;
  children: ReactNode;
}) {
  return (
    <section style={cardStyle}>
      <div style={{ marginBottom: 8 }}>
        <h3 style={{ margin: 0, fontSize: 15, fontWeight: 600 }}>{title}</h3>
        {subtitle && (
          <div style={{ fontSize: 11, color: "#9ca3af", marginTop: 2 }}>{subtitle}</div>
        )}
      </div>
      {children}
    </section>
  );
}

// A labelled number input. Values are kept as strings so that a field can
// be cleared while typing; callers parse them when calculating.
export function LabeledNumberInput({
  id,
  label,
  value,
  onChange,
  min,
  max,
  step,
  error,
}: {
  id: string;
  label: string;
  value: string;
  onChange: (val: string) => void;
  min?: number;
  max?: number;
  step?: number;
  error?: string;
}) {
  return (
    <div style={{ display: "flex", flexDirection: "column", flex: "1 1 180px" }}>
      <label htmlFor={id} style={{ fontSize: 11, color: "#a1a1aa", marginBottom: 2 }}>
        {label}
      </label>
      <input
        id={id}
        type="number"
        value={value}
        onChange={(e) => onChange(e.target.value)}
        min={min}
        max={max}
        step={step}
        style={error ? { ...inputStyle, borderColor: "#f87171" } : inputStyle}
      />
      {error && (
        <span role="alert" style={{ fontSize: 10, color: "#fca5a5", marginTop: 2 }}>
          {error}
        </span>
      )}
    </div>
  );
}

const cardStyle: CSSProperties = {
  borderRadius: 12,
  border: "1px solid #27272a",
  backgroundColor: "#09090b",
  padding: 12,
  marginBottom: 12,
};

const inputStyle: CSSProperties = {
  borderRadius: 6,
  border: "1px solid #27272a",
  padding: "4px 6px",
  backgroundColor: "#020617",
  color: "#e4e4e7",
  fontSize: 13,
};
