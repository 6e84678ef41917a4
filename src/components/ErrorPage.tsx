import { AppHeader } from "@/components/AppHeader";

interface ErrorPageProps {
  status: number;
  message: string;
}

export function ErrorPage({ status, message }: ErrorPageProps) {
  const heading = status >= 500 ? "Something went wrong" : "The request could not be processed";

  return (
    <>
      <AppHeader />
      <div className="card error-card">
        <h2>{heading}</h2>
        <p className="muted">{`${status}: ${message}`}</p>
        <a href="/" className="button-link">
          Back to expenses
        </a>
      </div>
    </>
  );
}
