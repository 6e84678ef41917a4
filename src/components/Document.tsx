import type { ReactNode } from "react";

interface DocumentProps {
  title: string;
  children: ReactNode;
}

export function Document({ title, children }: DocumentProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="UTF-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{title}</title>
        <link rel="stylesheet" href="/static/css/styles.css" />
      </head>
      <body>
        <div className="container">{children}</div>
      </body>
    </html>
  );
}
