'use client';

import { useState } from 'react';

interface TextFieldProps {
  label: string;
  value: string | null;
  onChange: (value: string) => void;
  placeholder?: string;
  required?: boolean;
  type?: 'text' | 'email' | 'tel' | 'url';
}

export default function TextField({
  label,
  value,
  onChange,
  placeholder,
  required = false,
  type = 'text'
}: TextFieldProps) {
  const [isFocused, setIsFocused] = useState(false);

  const inputClasses = `
    w-full px-4 py-3
    text-base text-gray-800
    bg-white/50 backdrop-blur-sm
    border-2 rounded-xl
    transition-all duration-300
    focus:outline-none focus:ring-0
    placeholder:text-gray-400
    ${isFocused
      ? 'border-brand-light shadow-lg shadow-brand-light/20'
      : 'border-gray-200 hover:border-gray-300'
    }
  `;

  return (
    <label className="block space-y-1">
      <span className="text-sm font-medium text-gray-600">
        {label}
        {required && <span className="text-red-500"> *</span>}
      </span>
      <input
        type={type}
        value={value ?? ''}
        onChange={(e) => onChange(e.target.value)}
        onFocus={() => setIsFocused(true)}
        onBlur={() => setIsFocused(false)}
        placeholder={placeholder}
        className={inputClasses}
      />
    </label>
  );
}
