import Link from "next/link";

export default function Home() {
  return (
    <div className="min-h-screen bg-gradient-to-br from-white via-blue-50/30 to-orange-50/40 flex items-center justify-center p-4">
      <div className="max-w-2xl w-full text-center space-y-12">
        <div className="space-y-4">
          <h1 className="text-6xl font-semibold text-gray-900">
            Card Studio
          </h1>
          <p className="text-xl text-gray-600 max-w-lg mx-auto">
            Design the contact card you share with a tap
          </p>
        </div>

        <div className="flex flex-col gap-4 max-w-md mx-auto">
          <Link
            href="/profile/edit"
            className="px-8 py-4 bg-brand text-white rounded-full text-lg font-medium hover:bg-brand-light transition-colors shadow-lg hover:shadow-xl"
          >
            Edit Your Card
          </Link>
        </div>
      </div>
    </div>
  );
}
