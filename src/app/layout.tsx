import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Rubric Grader",
  description: "Score an assignment against its grading rubric",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased min-h-screen flex flex-col">
        <header className="border-b border-black/10 dark:border-white/15">
          <div className="mx-auto w-full max-w-6xl px-6 py-4 flex items-center justify-between">
            <h1 className="text-lg font-semibold">Rubric Grader</h1>
            <nav className="text-sm opacity-80">Upload a rubric and an assignment</nav>
          </div>
        </header>
        <main className="flex-1">
          {children}
        </main>
        <footer className="border-t border-black/10 dark:border-white/15">
          <div className="mx-auto w-full max-w-6xl px-6 py-4 text-sm opacity-80">
            © {new Date().getFullYear()} Rubric Grader
          </div>
        </footer>
      </body>
    </html>
  );
}
