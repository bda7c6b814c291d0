import { useState, type FormEvent } from 'react';

interface SearchBarProps {
  onSearch: (title: string) => void;
  searching: boolean;
}

export function SearchBar({ onSearch, searching }: SearchBarProps) {
  const [title, setTitle] = useState('');

  const handleSubmit = (e: FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    onSearch(title);
  };

  return (
    <form onSubmit={handleSubmit} className="flex items-center gap-2" role="search">
      <input
        type="text"
        value={title}
        onChange={(e) => setTitle(e.target.value)}
        placeholder="Paper title, e.g. Attention Is All You Need"
        aria-label="Paper title"
        className="
          w-80 bg-white/5 border border-white/10 rounded-lg
          px-3 py-2 text-sm text-white placeholder:text-gray-500
          focus:outline-none focus:border-indigo-500/60
        "
      />
      <button
        type="submit"
        disabled={searching}
        className="
          bg-indigo-600 hover:bg-indigo-500 disabled:opacity-50
          text-white text-sm font-medium rounded-lg px-4 py-2
          transition-colors duration-200
        "
      >
        {searching ? 'Searching...' : 'Search'}
      </button>
    </form>
  );
}
