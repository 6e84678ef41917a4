import { AppHeader } from "@/components/AppHeader";

export default function NotFound({ path }: { path: string }) {
  return (
    <>
      <AppHeader />
      <div className="card error-card">
        <h2>Page not found</h2>
        <p className="muted">{`Nothing lives at ${path}.`}</p>
        <a href="/" className="button-link">
          Back to expenses
        </a>
      </div>
    </>
  );
}
