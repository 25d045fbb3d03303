// src/App.tsx
import type { CSSProperties } from "react";
import CarLoanTab from "./components/CarLoanTab";

export default function App() {
  return (
    <div style={styles.container}>
      <h2 style={styles.header}>🚗 Car EMI Calculator with Partial Prepayments</h2>
      <CarLoanTab />
    </div>
  );
}

const styles: Record<string, CSSProperties> = {
  container: {
    maxWidth: 960,
    margin: "0 auto",
    padding: 16,
    fontFamily: "system-ui, -apple-system, BlinkMacSystemFont, sans-serif",
    color: "#e4e4e7",
  },
  header: {
    marginTop: 0,
    marginBottom: 16,
  },
};
