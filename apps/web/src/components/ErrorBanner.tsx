import React from 'react';

export default function ErrorBanner({ message }: { message: string }) {
  return (
    <div
      role="alert"
      style={{
        background: '#fff4e5',
        border: '1px solid #f0b37e',
        borderRadius: 6,
        color: '#7a4100',
        padding: '8px 12px',
        margin: '8px 0',
      }}
    >
      {message}
    </div>
  );
}
